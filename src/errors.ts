export class ConfigurationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigurationError";
  }
}

export class ExternalServiceError extends Error {
  readonly service: string;
  readonly status?: number;

  constructor(service: string, message: string, options?: { status?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "ExternalServiceError";
    this.service = service;
    this.status = options?.status;
  }
}

export const PARSE_SNIPPET_LENGTH = 300;

export class ParseError extends Error {
  readonly snippet: string;

  constructor(text: string, message = "Model returned unparseable text") {
    const snippet = Array.from(text).slice(0, PARSE_SNIPPET_LENGTH).join("");
    super(snippet.trim() ? `${message}: ${snippet}` : message);
    this.name = "ParseError";
    this.snippet = snippet;
  }
}

export class EmptyResponseError extends ParseError {
  constructor(text: string) {
    super(text, "Model returned an empty response");
    this.name = "EmptyResponseError";
  }
}

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}
