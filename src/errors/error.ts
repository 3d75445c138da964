export interface OpenAIErrorOptions {
  message: string;
  statusCode?: number;
  code?: string;
  param?: string;
  type?: string;
  apiMessage?: string;
  requestId?: string;
  cause?: Error;
}

export abstract class OpenAIError extends Error {
  public readonly statusCode?: number;
  public readonly code?: string;
  public readonly param?: string;
  public readonly type?: string;
  /** The `error.message` field returned by the API, when there was one. */
  public readonly apiMessage?: string;
  public readonly requestId?: string;
  public override readonly cause?: Error;

  constructor(options: OpenAIErrorOptions) {
    super(options.message);
    this.name = this.constructor.name;
    this.statusCode = options.statusCode;
    this.code = options.code;
    this.param = options.param;
    this.type = options.type;
    this.apiMessage = options.apiMessage;
    this.requestId = options.requestId;
    this.cause = options.cause;

    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      statusCode: this.statusCode,
      code: this.code,
      param: this.param,
      type: this.type,
      apiMessage: this.apiMessage,
      requestId: this.requestId,
    };
  }
}
