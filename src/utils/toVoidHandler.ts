import type { Logger } from "../config/logger";
import { silentLogger } from "../config/logger";

type ErrorReporter = (error: unknown) => void;

type VoidHandlerOptions = {
  onError?: ErrorReporter;
  label?: string;
  logger?: Logger;
};

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return typeof value === "object" && value !== null && "then" in value && typeof value.then === "function";
}

/**
 * Wraps a possibly-async handler for event props that expect `void`. Rejections
 * and throws are logged under `label` and handed to `onError`.
 */
export function toVoidHandler<TArgs extends unknown[]>(
  handler: (...args: TArgs) => void | Promise<unknown>,
  options: VoidHandlerOptions = {}
): (...args: TArgs) => void {
  const { onError, label = "ui-handler", logger = silentLogger } = options;
  const report = (error: unknown) => {
    logger.error("handler failed", { label, error });
    onError?.(error);
  };

  return (...args: TArgs) => {
    try {
      const result = handler(...args);
      if (isPromiseLike(result)) {
        void Promise.resolve(result).catch(report);
      }
    } catch (error: unknown) {
      report(error);
    }
  };
}
