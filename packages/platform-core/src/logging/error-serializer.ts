export interface SerializedError {
  message: string;
  stack?: string;
  name?: string;
  cause?: SerializedError;
  code?: string;
}

function readCode(error: Error): string | undefined {
  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Flatten an error (and its cause chain) into loggable fields
 */
export function serializeError(error: unknown, depth = 0): SerializedError {
  if (error instanceof Error) {
    const serialized: SerializedError = {
      message: error.message,
      name: error.name,
      stack: error.stack,
    };

    const code = readCode(error);
    if (code) {
      serialized.code = code;
    }

    if (error.cause !== undefined && depth < 3) {
      serialized.cause = serializeError(error.cause, depth + 1);
    }

    return serialized;
  }

  if (typeof error === 'string') {
    return { message: error };
  }

  return { message: String(error) };
}
