import { ValidationError } from './errors'

/** Positive integer id from a route segment or query value. */
export function parseId(value: string | null | undefined, label = 'id'): number {
  const id = Number(value)
  if (!value || !Number.isInteger(id) || id <= 0) {
    throw new ValidationError(`Invalid ${label}`)
  }
  return id
}
