import { readFile, writeFile } from "node:fs/promises";
import { LINE_TERMINATOR } from "./text-buffer.js";

/**
 * 磁盘访问。内容按 latin1 处理，保证字节原样往返。
 */
export interface FileStore {
	/** 读取文件的行（去掉行终止符） */
	loadLines(path: string): Promise<string[]>;
	/** 写入给定字节，返回写入的字节数 */
	writeBytes(path: string, bytes: string): Promise<number>;
}

/**
 * 把文件内容拆分为行。每行去掉结尾的 `\r`，最后一个换行符之后的空内容
 * 不算作一行。
 */
export function splitLines(content: string): string[] {
	if (content.length === 0) return [];
	const lines = content.split(LINE_TERMINATOR);
	if (content.endsWith(LINE_TERMINATOR)) {
		lines.pop();
	}
	return lines.map((line) => (line.endsWith("\r") ? line.slice(0, -1) : line));
}

function isNotFound(error: unknown): boolean {
	return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export class NodeFileStore implements FileStore {
	/** 文件不存在时返回空行列表（以该文件名新建缓冲区） */
	async loadLines(path: string): Promise<string[]> {
		try {
			const content = await readFile(path);
			return splitLines(content.toString("latin1"));
		} catch (error) {
			if (isNotFound(error)) return [];
			throw error;
		}
	}

	async writeBytes(path: string, bytes: string): Promise<number> {
		const data = Buffer.from(bytes, "latin1");
		await writeFile(path, data, { mode: 0o644 });
		return data.length;
	}
}

/**
 * 内存中的 FileStore（无文件 I/O）
 */
export class InMemoryFileStore implements FileStore {
	readonly files = new Map<string, string>();
	private readonly failures = new Map<string, Error>();

	constructor(files: Record<string, string> = {}) {
		for (const [path, content] of Object.entries(files)) {
			this.files.set(path, content);
		}
	}

	/** 让之后对该路径的写入失败 */
	failWrites(path: string, error: Error): void {
		this.failures.set(path, error);
	}

	async loadLines(path: string): Promise<string[]> {
		return splitLines(this.files.get(path) ?? "");
	}

	async writeBytes(path: string, bytes: string): Promise<number> {
		const failure = this.failures.get(path);
		if (failure) throw failure;
		this.files.set(path, bytes);
		return bytes.length;
	}
}
