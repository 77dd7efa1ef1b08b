/**
 * 要求の検証（zod）
 *
 * 形の検証だけを行い、モード固有の規則（k と n の関係）は modes.ts に置く。
 * ZodError は外に出さず、必ず InvalidRequestError に変換する。
 */

import { z } from 'zod'
import { InvalidRequestError } from './errors.js'
import type { EnumerationModeName } from './types.js'

export const MODE_NAMES = ['all', 'exact-k'] as const satisfies readonly EnumerationModeName[]

const natural = z.number().int().nonnegative()

export const enumerationRequestSchema = z.object({
  n: natural,
  mode: z.enum(MODE_NAMES),
  k: natural.optional(),
})

export const treeRequestSchema = z
  .object({
    n: natural,
    k: natural,
  })
  .refine((req) => req.k <= req.n, { message: 'k は n 以下でなければなりません', path: ['k'] })

export type EnumerationRequest = z.infer<typeof enumerationRequestSchema>
export type TreeRequest = z.infer<typeof treeRequestSchema>

/** zod の検証結果を InvalidRequestError に変換して返す */
function parseOrThrow<S extends z.ZodTypeAny>(schema: S, input: unknown, what: string): z.infer<S> {
  const parsed = schema.safeParse(input)
  if (parsed.success) return parsed.data
  const issues = parsed.error.issues.map((issue) => {
    const path = issue.path.join('.')
    return path ? `${path}: ${issue.message}` : issue.message
  })
  throw new InvalidRequestError(`不正な${what}: ${issues.join('; ')}`, issues)
}

/** 列挙要求を検証 */
export function parseEnumerationRequest(input: {
  n: number
  mode: string
  k?: number | undefined
}): EnumerationRequest {
  return parseOrThrow(enumerationRequestSchema, input, '列挙要求')
}

/** 木の要求を検証 */
export function parseTreeRequest(input: { n: number; k: number }): TreeRequest {
  return parseOrThrow(treeRequestSchema, input, '木の要求')
}
