import type { Logger } from "pino";
import { logger as rootLogger } from "../../logger.js";
import type { CategoryResolver } from "../categories.js";
import type { OptionManager } from "../options.js";
import type { ProductStore } from "../store.js";

export type OrchestratorLog = (
  productId: number | undefined,
  operation: string,
  event: string,
  extra?: Record<string, unknown>,
) => void;

export type OrchestratorDeps = {
  store: ProductStore;
  categories: CategoryResolver;
  options: OptionManager;
};

export type OrchestratorContext = OrchestratorDeps & {
  /** Successful writes, at info level. */
  log: OrchestratorLog;
  /** Refused calls, at debug level. */
  rejected: OrchestratorLog;
};

export function createContext(deps: OrchestratorDeps, logger: Logger = rootLogger): OrchestratorContext {
  const write = (level: "info" | "debug"): OrchestratorLog =>
    (productId, operation, event, extra) =>
      logger[level]({ productId, op: operation, event, ...extra });
  return {
    store: deps.store,
    categories: deps.categories,
    options: deps.options,
    log: write("info"),
    rejected: write("debug"),
  };
}
