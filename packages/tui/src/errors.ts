/**
 * 终端操作失败（进入/恢复原始模式、查询窗口尺寸、读取输入）。
 * 这类错误不可恢复，调用方应恢复终端并退出。
 */
export class TerminalError extends Error {
	readonly operation: string;

	constructor(operation: string, cause?: unknown) {
		super(`${operation}: ${describeCause(cause)}`, { cause });
		this.name = "TerminalError";
		this.operation = operation;
	}
}

function describeCause(cause: unknown): string {
	if (cause === undefined) return "unknown error";
	return cause instanceof Error ? cause.message : String(cause);
}
