/**
 * 不正な要求 (n, k, mode の組み合わせ)。
 * first / buildTree などの要求時点でのみ投げられ、
 * next / previous / step の途中では投げられない。
 */
export class InvalidRequestError extends Error {
  readonly issues: readonly string[]

  constructor(message: string, issues: readonly string[] = [message]) {
    super(message)
    this.name = 'InvalidRequestError'
    this.issues = issues
  }
}
