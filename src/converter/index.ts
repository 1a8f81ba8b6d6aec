export {
	ExitState,
	type ExitAdapter,
	type ExitRequest,
	type ExitTransition,
	type PoolLink,
} from "./types.js";
export { applyExitTransition, isTerminal, openExitRequest } from "./exit-request.js";
export { Converter, type ConverterDeps } from "./converter.js";
export { InMemoryExitAdapter } from "./in-memory-exit-adapter.js";
