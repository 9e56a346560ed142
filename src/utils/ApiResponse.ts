export type ApiMeta = {
  total: number;
};

/**
 * Envelope for every successful response. Failures are shaped by the error
 * middleware instead.
 */
export class ApiResponse<T = unknown> {
  readonly success = true;
  message: string;
  data?: T;
  meta?: ApiMeta;

  private constructor(message: string, data?: T, meta?: ApiMeta) {
    this.message = message;
    if (data !== undefined) {
      this.data = data;
    }
    if (meta) {
      this.meta = meta;
    }
  }

  static success<T>(message: string, data?: T, meta?: ApiMeta): ApiResponse<T> {
    return new ApiResponse<T>(message, data, meta);
  }
}
