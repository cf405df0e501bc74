/**
 * 输出通道
 *
 * 运行器只通过该接口写出文本；CLI 绑定 process.stdout/stderr，测试使用内存缓冲。
 */
export interface IOutputSink {
	/** 写出数据（数字、统计结果） */
	out(text: string): void;

	/** 写出错误提示 */
	err(text: string): void;
}
