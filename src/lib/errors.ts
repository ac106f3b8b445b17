import { NextResponse } from 'next/server'
import { ZodError } from 'zod'

export class AppError extends Error {
  readonly status: number
  readonly code: string

  constructor(message: string, status = 500, code = 'internal_error') {
    super(message)
    this.name = 'AppError'
    this.status = status
    this.code = code
  }
}

export class ValidationError extends AppError {
  readonly details: Record<string, string[]> | undefined

  constructor(message: string, details?: Record<string, string[]>) {
    super(message, 400, 'validation_error')
    this.name = 'ValidationError'
    this.details = details
  }
}

export class NotFoundError extends AppError {
  constructor(message = 'Not found') {
    super(message, 404, 'not_found')
    this.name = 'NotFoundError'
  }
}

export class ForbiddenError extends AppError {
  constructor(message = 'Forbidden') {
    super(message, 403, 'forbidden')
    this.name = 'ForbiddenError'
  }
}

export class UnauthorizedError extends AppError {
  constructor(message = 'Unauthorized') {
    super(message, 401, 'unauthorized')
    this.name = 'UnauthorizedError'
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super(message, 409, 'conflict')
    this.name = 'ConflictError'
  }
}

/**
 * Flatten zod issues into `{ field: [messages] }`.
 */
export function zodDetails(error: ZodError): Record<string, string[]> {
  const details: Record<string, string[]> = {}
  for (const issue of error.issues) {
    const key = issue.path.length ? issue.path.join('.') : '_'
    details[key] = [...(details[key] ?? []), issue.message]
  }
  return details
}

/**
 * Map a thrown value to a JSON response. Unknown errors are logged and
 * reported as 500 with the fallback message.
 */
export function errorResponse(error: unknown, fallbackMessage: string) {
  if (error instanceof ValidationError) {
    return NextResponse.json({ error: error.message, details: error.details }, { status: error.status })
  }
  if (error instanceof ZodError) {
    return NextResponse.json({ error: 'Invalid input', details: zodDetails(error) }, { status: 400 })
  }
  // req.json() on a malformed body
  if (error instanceof SyntaxError) {
    return NextResponse.json({ error: 'Invalid JSON body' }, { status: 400 })
  }
  if (error instanceof AppError) {
    return NextResponse.json({ error: error.message }, { status: error.status })
  }
  console.error(`${fallbackMessage}:`, error)
  return NextResponse.json({ error: fallbackMessage }, { status: 500 })
}
