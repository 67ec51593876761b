/**
 * Property tests for the search engine.
 *
 * Tests the invariants over arbitrary valid catalogs:
 * - No room, instructor or section clash in any returned assignment
 * - Every assigned value comes from its variable's domain
 * - Determinism across repeated runs
 * - Termination within the iteration budget
 */
import { describe, it, expect } from 'vitest'
import * as fc from 'fast-check'
import { catalogGen } from '../generators/catalog'
import { buildModel } from '../../../src/catalog'
import { createProblem } from '../../../src/domains'
import { backtrackingSearch, type SearchProgress } from '../../../src/search'
import { projectSchedule, findScheduleClashes } from '../../../src/projection'
import { assertNoClashes } from '../../helpers/schedule-invariants'

const budgetGen = fc.integer({ min: 1, max: 300 })

describe('Search properties', () => {
  it('never produces a clash, complete or partial', () => {
    fc.assert(
      fc.property(catalogGen(), budgetGen, (records, maxIterations) => {
        const problem = createProblem(buildModel(records))
        const outcome = backtrackingSearch(problem, { maxIterations })
        const rows = projectSchedule(problem, outcome.assignment)

        assertNoClashes(rows)
        expect(findScheduleClashes(rows)).toEqual([])
      }),
    )
  })

  it('only assigns values drawn from the variable domain', () => {
    fc.assert(
      fc.property(catalogGen(), records => {
        const problem = createProblem(buildModel(records))
        const outcome = backtrackingSearch(problem)

        for (const [key, value] of outcome.assignment) {
          expect(problem.domains.get(key)?.values).toContain(value)
        }
      }),
    )
  })

  it('is deterministic for identical catalogs', () => {
    fc.assert(
      fc.property(catalogGen(), budgetGen, (records, maxIterations) => {
        const a = backtrackingSearch(createProblem(buildModel(records)), { maxIterations })
        const b = backtrackingSearch(createProblem(buildModel(records)), { maxIterations })

        expect(b.status).toBe(a.status)
        expect(b.iterations).toBe(a.iterations)
        expect([...b.assignment.entries()]).toEqual([...a.assignment.entries()])
      }),
    )
  })

  it('terminates within the budget with monotonic progress', () => {
    fc.assert(
      fc.property(catalogGen({ maxCourses: 5, maxSections: 4 }), budgetGen, (records, maxIterations) => {
        const seen: SearchProgress[] = []
        const outcome = backtrackingSearch(createProblem(buildModel(records)), {
          maxIterations,
          progressInterval: 1,
          onProgress: p => seen.push(p),
        })

        expect(outcome.iterations).toBeGreaterThanOrEqual(1)
        expect(outcome.iterations).toBeLessThanOrEqual(maxIterations)
        for (let i = 1; i < seen.length; i++) {
          expect(seen[i]?.iterations).toBe((seen[i - 1]?.iterations ?? 0) + 1)
        }
        if (outcome.status === 'budgetExceeded') expect(outcome.iterations).toBe(maxIterations)
      }),
    )
  })

  it('reports solved only with every variable assigned', () => {
    fc.assert(
      fc.property(catalogGen(), budgetGen, (records, maxIterations) => {
        const problem = createProblem(buildModel(records))
        const outcome = backtrackingSearch(problem, { maxIterations })

        expect(outcome.variableCount).toBe(problem.variables.length)
        expect(outcome.assignedCount).toBe(outcome.assignment.size)
        if (outcome.status === 'solved') expect(outcome.assignedCount).toBe(outcome.variableCount)
        if (outcome.assignedCount < outcome.variableCount) expect(outcome.status).not.toBe('solved')
        expect(projectSchedule(problem, outcome.assignment)).toHaveLength(outcome.assignedCount)
      }),
    )
  })
})
