import { isGatewayError, toErrorText } from "../errors.js";
import type { SqlGatewayApi } from "./types.js";

/**
 * The gateway reports why an operation failed only when its result is read,
 * so reading token 0 of an ERROR operation surfaces the failure message.
 */
export async function readOperationError(
  client: SqlGatewayApi,
  sessionHandle: string,
  operationHandle: string
): Promise<string> {
  try {
    await client.fetchResultPage(sessionHandle, operationHandle, 0);
  } catch (error) {
    if (isGatewayError(error, "gateway_unreachable")) {
      return `Statement failed; the error detail could not be read: ${error.message}`;
    }
    return toErrorText(error);
  }
  return "Statement failed without an error message from the gateway";
}
