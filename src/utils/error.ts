import { BridgeError } from '../types';

// Format error for the `error.message` field of an RPC response
export function formatErrorForResponse(error: unknown): string {
  if (error instanceof BridgeError) {
    return error.message;
  }

  if (error instanceof Error) {
    return `Internal error: ${error.message}`;
  }

  return `Internal error: ${String(error)}`;
}

// Format error for diagnostic logs, including the code and any suggestion
export function formatErrorForLog(error: unknown): string {
  if (error instanceof BridgeError) {
    let message = `${error.code}: ${error.message}`;

    if (error.suggestion) {
      message += ` (suggestion: ${error.suggestion})`;
    }

    return message;
  }

  if (error instanceof Error) {
    return error.stack ?? error.message;
  }

  return String(error);
}

export function getErrorSuggestion(error: unknown): string | undefined {
  if (error instanceof BridgeError) {
    return error.suggestion;
  }

  return undefined;
}
