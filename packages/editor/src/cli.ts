#!/usr/bin/env node
/**
 * 编辑器 CLI 入口点。
 *
 * 运行：npm start -- [file]
 */
process.title = "tilde";

import { main } from "./main.js";

main(process.argv.slice(2)).then(
	() => process.exit(),
	(error: unknown) => {
		console.error(error);
		process.exit(1);
	},
);
