/**
 * course-timetabler
 *
 * Public API exports
 */

// Error system: base class, codes and subclasses
export {
  TimetableError, TimetableErrorCode,
  ConstructionError, EmptyDomainError, ValidationError, ParseError,
} from './errors'
export type { TimetableErrorCode as TimetableErrorCodeType, ConstructionEntity } from './errors'

// Result type
export type { Result } from './result'
export { Ok, Err } from './result'

// Time & days
export type { LocalTime, TeachingDay } from './time-date'
export { TEACHING_DAYS, parseTime, parseTeachingDay, makeTime, dayRank, compareTimes, compareDays } from './time-date'

// Branded ID types
export type { CourseId, InstructorId, RoomId, TimeSlotId, SectionId, VariableKey } from './types'
export { UNASSIGNED_INSTRUCTOR_ID, UNASSIGNED_INSTRUCTOR_NAME } from './types'

// Model builder
export type {
  FieldValue, CourseRecord, InstructorRecord, RoomRecord, TimeSlotRecord, SectionRecord, CatalogRecords,
  Course, Instructor, Room, TimeSlot, Section, TimetableModel,
} from './catalog'
export { buildModel, instructorsFor } from './catalog'

// Variables & domains
export type {
  Variable, DomainValue, RoomMatch, VariableDomain, Domains, DomainOptions, TimetableProblem,
} from './domains'
export {
  createVariables, computeDomain, computeDomains, createProblem,
  roomMatchesCourse, findRooms, isPlaceholderInstructor,
  DEFAULT_FALLBACK_ROOM_LIMIT,
} from './domains'

// Constraint checking
export type { ClashType, Placement, Clash } from './consistency'
export { clashBetween, isConsistent, findClashes } from './consistency'

// Search
export type {
  Assignment, SearchState, SearchProgress, SearchOptions,
  SearchSolved, SearchIncomplete, SearchOutcome,
} from './search'
export {
  backtrackingSearch, orderByMrv, selectUnassignedVariable, isSolved, SearchContext,
  DEFAULT_MAX_ITERATIONS, DEFAULT_PROGRESS_INTERVAL,
} from './search'

// Projection & reporting data
export type { ScheduleRow } from './projection'
export { projectSchedule, compareRows, findScheduleClashes } from './projection'
export type { ScheduleGroup } from './schedule-views'
export { groupBySection, groupByDay, groupByInstructor, groupByRoom } from './schedule-views'
export type { ScheduleSummary } from './statistics'
export { summarizeSchedule } from './statistics'
export type {
  SectionRoomCompatibility, RoomTypeWarning, RoomTypeSummary,
  InstructorQualificationReport, TimeslotSummary, DomainSummary,
} from './diagnostics'
export {
  sectionRoomCompatibility, roomTypeSummary, instructorQualificationReport,
  timeslotSummary, domainSummary,
} from './diagnostics'

// High-level API (builds the problem once, solves on demand, emits events)
export type {
  Timetabler, TimetablerConfig, SolveOptions, SolveResult,
  CatalogDiagnostics, TimetablerEvents,
} from './public-api'
export { createTimetabler } from './public-api'
