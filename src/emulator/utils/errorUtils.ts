import { captureException } from "@sentry/core";

export function handleError(error: unknown, errorInfo?: Record<string, unknown>) {
  console.error(error);
  captureException(error, { extra: errorInfo });
}
