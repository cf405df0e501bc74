#!/usr/bin/env node
/* 中文注释：命令行入口 */
import { processExitCode } from "./core/exitCodes.js";
import { createProcessSink } from "./runner/processSink.js";
import { runRoll } from "./runner/rollRunner.js";

const code = runRoll(process.argv.slice(2), { sink: createProcessSink() });
process.exitCode = processExitCode(code);
