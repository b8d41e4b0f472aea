import { ZodError } from 'zod';

export type ErrorCode = 'invalid_request' | 'invalid_selector' | 'internal';

export type ErrorPayload = {
  error: {
    code: ErrorCode;
    message: string;
    details?: unknown;
  };
};

/**
 * Base class for every error raised while turning selector text into an AST.
 * Evaluation never raises one of these.
 */
export class SelectorError extends Error {
  code = 'invalid_selector' as const;
  position: number;
  details: { position: number };

  constructor(message: string, position: number) {
    super(message);
    this.name = 'SelectorError';
    this.position = position;
    this.details = { position };
  }
}

export class LexError extends SelectorError {
  character: string;

  constructor(message: string, character: string, position: number) {
    super(message, position);
    this.name = 'LexError';
    this.character = character;
  }
}

export class ParseError extends SelectorError {
  expected: string;
  found: string;

  constructor(expected: string, found: string, position: number, message?: string) {
    super(message ?? `Expected ${expected} but found ${found} at position ${position}.`, position);
    this.name = 'ParseError';
    this.expected = expected;
    this.found = found;
  }
}

export function toErrorPayload(error: unknown): ErrorPayload {
  if (error instanceof SelectorError) {
    return {
      error: {
        code: error.code,
        message: error.message,
        details: error.details,
      },
    };
  }

  if (error instanceof ZodError) {
    return {
      error: {
        code: 'invalid_request',
        message: 'Request validation failed.',
        details: error.flatten(),
      },
    };
  }

  console.error(error);

  return {
    error: {
      code: 'internal',
      message: 'Internal server error.',
    },
  };
}
