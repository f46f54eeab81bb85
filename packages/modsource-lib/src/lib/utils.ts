import { backendLogger } from "./logger";

export function logError({
  error,
  shortMessage,
}: {
  error: unknown;
  shortMessage: string;
}): void {
  if (error instanceof Error) {
    backendLogger.error(shortMessage, {
      meta: { name: error.name, message: error.message },
      stack: error.stack,
    });
    return;
  }
  backendLogger.error(shortMessage, { meta: { error: String(error) } });
}
