/**
 * Public API Module
 *
 * Consumer-facing interface that ties the pipeline together: catalogs are
 * normalized and domains built eagerly (construction errors surface from
 * `createTimetabler`), then each `solve` runs a fresh search and projects the
 * result. Progress and outcomes are reported through `on` handlers.
 */

import { buildModel, type CatalogRecords } from './catalog'
import {
  createProblem, DEFAULT_FALLBACK_ROOM_LIMIT,
  type TimetableProblem, type Variable, type VariableDomain,
} from './domains'
import {
  backtrackingSearch, DEFAULT_MAX_ITERATIONS,
  type SearchOptions, type SearchOutcome, type SearchProgress,
} from './search'
import { projectSchedule, type ScheduleRow } from './projection'
import { summarizeSchedule, type ScheduleSummary } from './statistics'
import {
  sectionRoomCompatibility, roomTypeSummary, instructorQualificationReport,
  timeslotSummary, domainSummary,
  type SectionRoomCompatibility, type RoomTypeSummary, type InstructorQualificationReport,
  type TimeslotSummary, type DomainSummary,
} from './diagnostics'
import { courseId, sectionId, variableKey } from './types'
import { ValidationError } from './errors'

export { ValidationError } from './errors'

// ============================================================================
// Types
// ============================================================================

export type TimetablerConfig = {
  catalogs: CatalogRecords
  fallbackRoomLimit?: number
  /** Budget used by `solve` when the call does not name one */
  maxIterations?: number
}

export type SolveOptions = Omit<SearchOptions, 'onProgress'>

export type SolveResult = {
  outcome: SearchOutcome
  /** One row per assigned variable; partial when the search did not finish */
  rows: ScheduleRow[]
  summary: ScheduleSummary
}

export type CatalogDiagnostics = {
  sectionRooms: SectionRoomCompatibility[]
  roomTypes: RoomTypeSummary
  instructorCoverage: InstructorQualificationReport
  timeslots: TimeslotSummary
  domains: DomainSummary
}

export type TimetablerEvents = {
  progress: SearchProgress
  solved: SolveResult
  incomplete: SolveResult
}

export type Timetabler = {
  readonly problem: TimetableProblem
  getVariables(): readonly Variable[]
  getDomain(section: string, course: string): VariableDomain | null
  solve(options?: SolveOptions): SolveResult
  diagnostics(): CatalogDiagnostics
  on<E extends keyof TimetablerEvents>(event: E, handler: (payload: TimetablerEvents[E]) => void): void
}

// ============================================================================
// Validation
// ============================================================================

function validateConfig(config: TimetablerConfig): void {
  const { fallbackRoomLimit, maxIterations } = config
  if (fallbackRoomLimit !== undefined && (!Number.isInteger(fallbackRoomLimit) || fallbackRoomLimit < 1)) {
    throw new ValidationError(`fallbackRoomLimit must be a positive integer, got ${fallbackRoomLimit}`)
  }
  if (maxIterations !== undefined && (!Number.isInteger(maxIterations) || maxIterations < 1)) {
    throw new ValidationError(`maxIterations must be a positive integer, got ${maxIterations}`)
  }
}

// ============================================================================
// Factory
// ============================================================================

export function createTimetabler(config: TimetablerConfig): Timetabler {
  validateConfig(config)

  const model = buildModel(config.catalogs)
  const problem = createProblem(model, {
    fallbackRoomLimit: config.fallbackRoomLimit ?? DEFAULT_FALLBACK_ROOM_LIMIT,
  })
  const defaultMaxIterations = config.maxIterations ?? DEFAULT_MAX_ITERATIONS

  // Event handlers
  const eventHandlers: { [E in keyof TimetablerEvents]: Array<(payload: TimetablerEvents[E]) => void> } = {
    progress: [],
    solved: [],
    incomplete: [],
  }

  function emit<E extends keyof TimetablerEvents>(event: E, payload: TimetablerEvents[E]): boolean {
    let hadErrors = false
    for (const handler of eventHandlers[event]) {
      try { handler(payload) } catch (e) { hadErrors = true; console.error(`Event handler error on '${event}':`, e) }
    }
    return !hadErrors
  }

  function on<E extends keyof TimetablerEvents>(event: E, handler: (payload: TimetablerEvents[E]) => void) {
    eventHandlers[event].push(handler)
  }

  function solve(options: SolveOptions = {}): SolveResult {
    const outcome = backtrackingSearch(problem, {
      ...options,
      maxIterations: options.maxIterations ?? defaultMaxIterations,
      onProgress: progress => { emit('progress', progress) },
    })

    const rows = projectSchedule(problem, outcome.assignment)
    const result: SolveResult = { outcome, rows, summary: summarizeSchedule(rows) }
    emit(outcome.status === 'solved' ? 'solved' : 'incomplete', result)
    return result
  }

  return {
    problem,

    getVariables() {
      return problem.variables
    },

    getDomain(section: string, course: string) {
      return problem.domains.get(variableKey(sectionId(section), courseId(course))) ?? null
    },

    solve,

    diagnostics() {
      return {
        sectionRooms: sectionRoomCompatibility(model),
        roomTypes: roomTypeSummary(model),
        instructorCoverage: instructorQualificationReport(model),
        timeslots: timeslotSummary(model),
        domains: domainSummary(problem),
      }
    },

    on,
  }
}
