import type { ErrorShape } from "./protocol/index.js";
import type { GatewayRequestContext, GatewayRequestHandlers } from "./server-methods/types.js";
import { formatErrorMessage } from "../infra/errors.js";
import { createSubsystemLogger } from "../logging/subsystem.js";
import { ErrorCodes, errorShape } from "./protocol/index.js";
import { tasksHandlers } from "./server-methods/tasks.js";

const log = createSubsystemLogger("gateway");

export type GatewayRequestFrame = {
  id?: string;
  method: string;
  params?: Record<string, unknown>;
};

export type GatewayResponseFrame = {
  id?: string;
  ok: boolean;
  payload?: unknown;
  error?: ErrorShape;
};

export const coreGatewayHandlers: GatewayRequestHandlers = {
  ...tasksHandlers,
};

/** Routes one request frame to its handler and collects the single response. */
export function handleGatewayRequest(
  frame: GatewayRequestFrame,
  context: GatewayRequestContext,
  handlers: GatewayRequestHandlers = coreGatewayHandlers,
): GatewayResponseFrame {
  const handler = handlers[frame.method];
  if (!handler) {
    return {
      id: frame.id,
      ok: false,
      error: errorShape(ErrorCodes.INVALID_REQUEST, `unknown method: ${frame.method}`),
    };
  }

  const responses: GatewayResponseFrame[] = [];
  try {
    handler({
      params: frame.params,
      context,
      respond: (ok, payload, error) => {
        if (responses.length > 0) {
          return;
        }
        responses.push({ id: frame.id, ok, payload, error });
      },
    });
  } catch (err) {
    log.error(`${frame.method} failed: ${formatErrorMessage(err)}`);
    return {
      id: frame.id,
      ok: false,
      error: errorShape(ErrorCodes.UNAVAILABLE, formatErrorMessage(err)),
    };
  }

  return (
    responses[0] ?? {
      id: frame.id,
      ok: false,
      error: errorShape(ErrorCodes.UNAVAILABLE, `${frame.method} did not respond`),
    }
  );
}
