export function extractErrorCode(err: unknown): string | undefined {
  if (!err || typeof err !== "object" || !("code" in err)) {
    return undefined;
  }
  const code = err.code;
  if (typeof code === "string") {
    return code;
  }
  if (typeof code === "number") {
    return String(code);
  }
  return undefined;
}

export function formatErrorMessage(err: unknown): string {
  if (err instanceof Error) {
    return err.message || err.name || "Error";
  }
  if (typeof err === "string") {
    return err;
  }
  if (typeof err === "number" || typeof err === "boolean" || typeof err === "bigint") {
    return String(err);
  }
  try {
    return JSON.stringify(err) ?? String(err);
  } catch {
    return Object.prototype.toString.call(err);
  }
}

/** Name used to categorise a failure: the error's `name`, else its runtime type. */
export function resolveErrorType(err: unknown): string {
  if (err instanceof Error) {
    return err.name || err.constructor.name || "Error";
  }
  if (err === null) {
    return "null";
  }
  return typeof err;
}

const MAX_CAUSE_DEPTH = 8;

/**
 * Full diagnostic text for an error: its stack, followed by the stack of each
 * chained `cause`.
 */
export function formatErrorTrace(err: unknown): string {
  const parts: string[] = [];
  let current: unknown = err;
  for (let depth = 0; depth < MAX_CAUSE_DEPTH && current !== undefined; depth++) {
    const prefix = depth === 0 ? "" : "Caused by: ";
    if (current instanceof Error) {
      parts.push(prefix + (current.stack ?? `${resolveErrorType(current)}: ${current.message}`));
      current = current.cause;
    } else {
      parts.push(prefix + `${resolveErrorType(current)}: ${formatErrorMessage(current)}`);
      current = undefined;
    }
  }
  return parts.join("\n");
}
