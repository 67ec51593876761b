/**
 * Backtracking Search
 *
 * Depth-first chronological backtracking over the timetable problem.
 * Variables are taken in MRV order (smallest fixed domain first, ties to
 * construction order) and candidates in their domain order. The search is
 * bounded by an iteration budget; running out is a normal outcome.
 */

import type { DomainValue, TimetableProblem, Variable, Domains } from './domains'
import { isConsistent } from './consistency'
import type { SectionId, VariableKey } from './types'
import { ValidationError } from './errors'

// ============================================================================
// Types
// ============================================================================

export type Assignment = ReadonlyMap<VariableKey, DomainValue>

export type SearchState = 'searching' | 'solved' | 'exhausted' | 'budgetExceeded'

export type SearchProgress = {
  iterations: number
  assigned: number
  total: number
}

export type SearchOptions = {
  /** Hard cap on recursive steps. Default 1000. */
  maxIterations?: number
  /** Wall-clock cap, checked at the same point as the iteration cap */
  timeLimitMs?: number
  progressInterval?: number
  onProgress?: (progress: SearchProgress) => void
}

type OutcomeBase = {
  assignment: Assignment
  iterations: number
  assignedCount: number
  variableCount: number
}

export type SearchSolved = OutcomeBase & { status: 'solved' }

/** Budget or search space ran out first. Carries the largest partial assignment reached. */
export type SearchIncomplete = OutcomeBase & { status: 'exhausted' | 'budgetExceeded' }

export type SearchOutcome = SearchSolved | SearchIncomplete

export const DEFAULT_MAX_ITERATIONS = 1000
export const DEFAULT_PROGRESS_INTERVAL = 100

// ============================================================================
// Variable Ordering
// ============================================================================

/**
 * Static MRV order. Domains never shrink during search, so the order is
 * computed once; `Array.prototype.sort` is stable, which keeps ties in
 * construction order.
 */
export function orderByMrv(variables: readonly Variable[], domains: Domains): Variable[] {
  return [...variables].sort((a, b) => {
    const sizeA = domains.get(a.key)?.values.length ?? 0
    const sizeB = domains.get(b.key)?.values.length ?? 0
    return sizeA - sizeB
  })
}

export function selectUnassignedVariable(ordered: readonly Variable[], assignment: Assignment): Variable | undefined {
  return ordered.find(v => !assignment.has(v.key))
}

// ============================================================================
// Search Context
// ============================================================================

/**
 * Mutable state of one solve call. Only `backtrack` mutates it, and every
 * assignment it makes is undone on the way out.
 */
export class SearchContext {
  readonly assignment = new Map<VariableKey, DomainValue>()
  iterations = 0
  state: SearchState = 'searching'

  private best: Map<VariableKey, DomainValue> = new Map()
  private readonly sections: Map<VariableKey, SectionId>
  private readonly deadline: number | undefined
  private readonly maxIterations: number
  private readonly progressInterval: number
  private readonly onProgress: ((progress: SearchProgress) => void) | undefined

  constructor(readonly problem: TimetableProblem, options: SearchOptions = {}) {
    this.maxIterations = options.maxIterations ?? DEFAULT_MAX_ITERATIONS
    this.progressInterval = options.progressInterval ?? DEFAULT_PROGRESS_INTERVAL
    this.onProgress = options.onProgress
    this.deadline = options.timeLimitMs !== undefined ? Date.now() + options.timeLimitMs : undefined
    this.sections = new Map(problem.variables.map(v => [v.key, v.sectionId]))
  }

  get complete(): boolean {
    return this.assignment.size === this.problem.variables.length
  }

  get bestPartial(): Assignment {
    return this.best
  }

  /** Counts one step. False once the budget is spent, checked before completion. */
  tick(): boolean {
    this.iterations++

    if (this.iterations >= this.maxIterations) {
      this.state = 'budgetExceeded'
      return false
    }
    // Check wall-clock every 1024 iterations to avoid Date.now() overhead
    if (this.deadline !== undefined && (this.iterations & 0x3FF) === 0 && Date.now() > this.deadline) {
      this.state = 'budgetExceeded'
      return false
    }

    if (this.onProgress && this.iterations % this.progressInterval === 0) {
      this.onProgress({
        iterations: this.iterations,
        assigned: this.assignment.size,
        total: this.problem.variables.length,
      })
    }
    return true
  }

  consistent(variable: Variable, value: DomainValue): boolean {
    return isConsistent(variable, value, this.assignment, key => this.sections.get(key))
  }

  /** Runs `fn` with `variable = value` in place and always restores the prior state. */
  withAssignment<T>(variable: Variable, value: DomainValue, fn: () => T): T {
    this.assignment.set(variable.key, value)
    if (this.assignment.size > this.best.size) this.best = new Map(this.assignment)
    try {
      return fn()
    } finally {
      this.assignment.delete(variable.key)
    }
  }
}

// ============================================================================
// Backtracking
// ============================================================================

function backtrack(ctx: SearchContext, ordered: readonly Variable[]): Assignment | null {
  if (!ctx.tick()) return null

  if (ctx.complete) {
    ctx.state = 'solved'
    return new Map(ctx.assignment)
  }

  const variable = selectUnassignedVariable(ordered, ctx.assignment)
  if (!variable) return null

  const domain = ctx.problem.domains.get(variable.key)?.values ?? []
  for (const value of domain) {
    if (!ctx.consistent(variable, value)) continue

    const result = ctx.withAssignment(variable, value, () => backtrack(ctx, ordered))
    if (result) return result

    // Budget spent somewhere below: unwind without trying siblings
    if (ctx.state === 'budgetExceeded') return null
  }

  return null
}

function validateOptions(options: SearchOptions): void {
  const { maxIterations, timeLimitMs, progressInterval } = options
  if (maxIterations !== undefined && (!Number.isInteger(maxIterations) || maxIterations < 1)) {
    throw new ValidationError(`maxIterations must be a positive integer, got ${maxIterations}`)
  }
  if (timeLimitMs !== undefined && (!Number.isFinite(timeLimitMs) || timeLimitMs < 0)) {
    throw new ValidationError(`timeLimitMs must be a non-negative number, got ${timeLimitMs}`)
  }
  if (progressInterval !== undefined && (!Number.isInteger(progressInterval) || progressInterval < 1)) {
    throw new ValidationError(`progressInterval must be a positive integer, got ${progressInterval}`)
  }
}

export function backtrackingSearch(problem: TimetableProblem, options: SearchOptions = {}): SearchOutcome {
  validateOptions(options)

  const ctx = new SearchContext(problem, options)
  const ordered = orderByMrv(problem.variables, problem.domains)
  const solution = backtrack(ctx, ordered)
  const variableCount = problem.variables.length

  if (solution) {
    return {
      status: 'solved',
      assignment: solution,
      iterations: ctx.iterations,
      assignedCount: solution.size,
      variableCount,
    }
  }

  const partial = ctx.bestPartial
  return {
    status: ctx.state === 'budgetExceeded' ? 'budgetExceeded' : 'exhausted',
    assignment: partial,
    iterations: ctx.iterations,
    assignedCount: partial.size,
    variableCount,
  }
}

export function isSolved(outcome: SearchOutcome): outcome is SearchSolved {
  return outcome.status === 'solved'
}
