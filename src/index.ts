/**
 * randroll 库入口
 *
 * @packageDocumentation
 */

export * from "./config/index.js";
export * from "./contracts/index.js";
export * from "./core/errors/index.js";
export { ExitCode, exitCodeFor, processExitCode, type ExitCodeValue } from "./core/exitCodes.js";
export { ServiceContainer, type ContainerOptions } from "./core/container.js";
export { GENERATOR_IDS, DEFAULT_GENERATOR, isGeneratorId, type GeneratorId } from "./engine/generators.js";
export { createRandomSource, RandomSource, type Bounds } from "./engine/selector.js";
export { DegradedRandom, RAND_MAX } from "./engine/degraded.js";
export { Lehmer, LEHMER_MULTIPLIERS } from "./engine/lehmer.js";
export { applyRounding, ROUNDING_MODES, type RoundingMode } from "./pipeline/rounding.js";
export { FilterChain, type FilterOptions, type FilterStage, type FilterVerdict } from "./pipeline/filters.js";
export { generate, type GenerateOptions, type GenerateResult } from "./pipeline/generate.js";
export { computeStatistics, median, mean, populationVariance, minMax, STAT_KEYS, type Statistics } from "./stats/statistics.js";
export { formatNumber, formatValue, formatStatistics, formatFlags } from "./output/format.js";
export { parseArgv, formatHelp } from "./utils/cliParser.js";
export { runRoll, executeRun, type RunDeps } from "./runner/rollRunner.js";
export { createProcessSink } from "./runner/processSink.js";
export { createLogger, PinoLogger } from "./logging/index.js";
