// apps/backend/src/lib/errors.ts

export type HttpError = Error & { status: number }

export function httpError(status: number, message: string): HttpError {
  return Object.assign(new Error(message), { status })
}

export function isHttpError(err: unknown): err is HttpError {
  return err instanceof Error && 'status' in err && typeof err.status === 'number'
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message
  if (typeof err === 'string') return err
  try {
    return JSON.stringify(err) ?? String(err)
  } catch {
    // circular or BigInt-bearing values
    return String(err)
  }
}
