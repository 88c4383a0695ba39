/**
 * FixedStatementSource: hands out pre-written statements in order.
 *
 * Used when the caller already has the statement to judge, and by tests that
 * script a sequence of revisions.
 */

import { GenerationError } from '../../core/errors.js'
import type { CandidateStatement } from '../evaluator-pool/types.js'
import type { StatementRequest, StatementSource } from './statement-source.js'

export class FixedStatementSource implements StatementSource {
  private readonly _statements: readonly CandidateStatement[]
  private _next = 0

  constructor(statements: CandidateStatement | readonly CandidateStatement[]) {
    this._statements = isStatementList(statements) ? [...statements] : [statements]
  }

  /** Statements not yet handed out */
  get remaining(): number {
    return this._statements.length - this._next
  }

  generate(_request: StatementRequest): Promise<CandidateStatement> {
    const statement = this._statements[this._next]
    if (statement === undefined) {
      return Promise.reject(
        new GenerationError(`No statement left: all ${String(this._statements.length)} have been used`),
      )
    }
    this._next += 1
    return Promise.resolve(statement)
  }
}

function isStatementList(
  value: CandidateStatement | readonly CandidateStatement[],
): value is readonly CandidateStatement[] {
  return Array.isArray(value)
}
