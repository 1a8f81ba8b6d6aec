export { type DelegateBalances, DelegateDirectory } from "./delegate-directory.js";
export { DelegateWorker, type DelegateWorkerDeps } from "./delegate-worker.js";
