/* 中文注释：绑定到进程标准流的输出通道 */
import type { IOutputSink } from "../contracts/IOutputSink.js";

/**
 * 创建写入 stdout/stderr 的输出通道
 *
 * 下游提前关闭管道（如 `randroll -n 1000000 | head -1`）时 stdout 会触发 EPIPE：
 * 忽略该错误并停止继续写 stdout；其他流错误照常抛出。
 */
export function createProcessSink(
	stdout: NodeJS.WritableStream = process.stdout,
	stderr: NodeJS.WritableStream = process.stderr,
): IOutputSink {
	let stdoutClosed = false;
	stdout.on("error", (err: Error) => {
		if ("code" in err && err.code === "EPIPE") {
			stdoutClosed = true;
			return;
		}
		throw err;
	});

	return {
		out: (text) => {
			if (!stdoutClosed) stdout.write(text);
		},
		err: (text) => {
			stderr.write(text);
		},
	};
}
