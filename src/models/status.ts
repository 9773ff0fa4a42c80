/** Uniform error envelope returned for 400/401/404/500 responses. */
export interface ErrorStatus {
  readonly code: number;
  readonly message: string;
}

export function errorStatus(code: number, message: string): ErrorStatus {
  return { code, message };
}
