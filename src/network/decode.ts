import { z } from 'zod'
import { ProtocolError } from './errors'

/**
 * Number that providers send either as JSON number or as decimal string
 * (e.g. "67250.10"). Empty or non-numeric strings are rejected.
 */
export const decimal = z
  .union([
    z.number(),
    z.string().trim().regex(/^[-+]?(\d+\.?\d*|\.\d+)(e[-+]?\d+)?$/i).transform(Number)
  ])
  .refine(value => Number.isFinite(value), { message: 'Expected a finite number' })

/**
 * Run a payload through its schema; any mismatch fails the whole update
 * @throws ProtocolError naming the first offending field
 */
export function decodePayload<T extends z.ZodTypeAny>(schema: T, payload: unknown, source: string): z.output<T> {
  const result = schema.safeParse(payload)
  if (!result.success) {
    const issue = result.error.issues[0]
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : ''
    throw new ProtocolError(`Unexpected payload${where}: ${issue?.message ?? 'invalid'}`, source)
  }
  return result.data
}

/**
 * Parse a text frame as JSON, reporting failures as protocol errors
 */
export function parseJson(text: string, source: string): unknown {
  try {
    return JSON.parse(text)
  } catch (error) {
    throw new ProtocolError(`Malformed JSON: ${error instanceof Error ? error.message : String(error)}`, source)
  }
}
