/**
 * Variables & Domains
 *
 * One CSP variable per (section, required course). Each variable's domain is
 * the ordered product rooms × timeslots × instructors, where the room set is
 * relaxed in two steps when nothing fits: first capacity is dropped, then a
 * bounded prefix of the whole room catalog is taken.
 */

import type { TimetableModel, Room, TimeSlot } from './catalog'
import { instructorsFor } from './catalog'
import type { LocalTime, TeachingDay } from './time-date'
import {
  type CourseId, type InstructorId, type RoomId, type SectionId, type TimeSlotId, type VariableKey,
  variableKey, UNASSIGNED_INSTRUCTOR_ID, UNASSIGNED_INSTRUCTOR_NAME,
} from './types'
import { ConstructionError, EmptyDomainError } from './errors'

export { EmptyDomainError } from './errors'

// ============================================================================
// Types
// ============================================================================

export type Variable = {
  key: VariableKey
  sectionId: SectionId
  courseId: CourseId
  studentCount: number
  courseType: string
  courseName: string
}

export type DomainValue = {
  roomId: RoomId
  timeslotId: TimeSlotId
  day: TeachingDay
  start: LocalTime
  end: LocalTime
  instructorId: InstructorId
  instructorName: string
}

/** Which relaxation step produced a domain's rooms */
export type RoomMatch = 'matched' | 'capacityRelaxed' | 'fallback'

export type VariableDomain = {
  values: readonly DomainValue[]
  roomMatch: RoomMatch
}

export type Domains = ReadonlyMap<VariableKey, VariableDomain>

export type DomainOptions = {
  /** Rooms taken from the head of the catalog when no room is type-compatible */
  fallbackRoomLimit?: number
}

export type TimetableProblem = {
  model: TimetableModel
  variables: readonly Variable[]
  domains: Domains
}

export const DEFAULT_FALLBACK_ROOM_LIMIT = 10

// ============================================================================
// Variables
// ============================================================================

export function createVariables(model: TimetableModel): Variable[] {
  const variables: Variable[] = []
  const keys = new Set<string>()

  for (const section of model.sections.values()) {
    for (const id of section.courses) {
      const course = model.courses.get(id)
      if (!course) {
        throw new ConstructionError('section', section.id, 'Courses', `section '${section.id}': references unknown course '${id}'`)
      }
      const key = variableKey(section.id, id)
      if (keys.has(key)) {
        throw new ConstructionError('section', section.id, 'Courses', `section '${section.id}': variable key '${key}' is ambiguous`)
      }
      keys.add(key)
      variables.push({
        key,
        sectionId: section.id,
        courseId: id,
        studentCount: section.studentCount,
        courseType: course.type,
        courseName: course.name,
      })
    }
  }

  return variables
}

// ============================================================================
// Room Matching
// ============================================================================

/**
 * Type tags are matched by case-insensitive substring: a lecture course wants
 * a lecture room, a lab course a lab room, and a course mentioning both takes
 * any room.
 */
export function roomMatchesCourse(roomType: string, courseType: string): boolean {
  const room = roomType.toLowerCase()
  const course = courseType.toLowerCase()

  if (course.includes('lecture') && room.includes('lecture')) return true
  if (course.includes('lab') && room.includes('lab')) return true
  if (course.includes('lecture') && course.includes('lab')) return true

  return false
}

export function findRooms(
  rooms: Iterable<Room>,
  variable: Pick<Variable, 'courseType' | 'studentCount'>,
  fallbackRoomLimit: number = DEFAULT_FALLBACK_ROOM_LIMIT,
): { rooms: Room[]; roomMatch: RoomMatch } {
  const all = [...rooms]
  const compatible = all.filter(room => roomMatchesCourse(room.type, variable.courseType))

  const fitting = compatible.filter(room => room.capacity >= variable.studentCount)
  if (fitting.length > 0) return { rooms: fitting, roomMatch: 'matched' }

  if (compatible.length > 0) return { rooms: compatible, roomMatch: 'capacityRelaxed' }

  // Last resort: catalog-insertion order, bounded
  return { rooms: all.slice(0, fallbackRoomLimit), roomMatch: 'fallback' }
}

// ============================================================================
// Domains
// ============================================================================

function instructorChoices(model: TimetableModel, course: CourseId): Array<{ id: InstructorId; name: string }> {
  const qualified = instructorsFor(model, course)
  if (qualified.length === 0) return [{ id: UNASSIGNED_INSTRUCTOR_ID, name: UNASSIGNED_INSTRUCTOR_NAME }]
  return qualified.map(i => ({ id: i.id, name: i.name }))
}

export function computeDomain(
  model: TimetableModel,
  variable: Variable,
  options: DomainOptions = {},
): VariableDomain {
  const { rooms, roomMatch } = findRooms(model.rooms.values(), variable, options.fallbackRoomLimit)
  const instructors = instructorChoices(model, variable.courseId)

  const values: DomainValue[] = []
  for (const room of rooms) {
    for (const slot of model.timeslots) {
      for (const instructor of instructors) {
        values.push(candidate(room, slot, instructor))
      }
    }
  }

  if (values.length === 0) {
    throw new EmptyDomainError(
      variable.key,
      `No candidates for '${variable.key}': ${model.rooms.size} rooms, ${model.timeslots.length} timeslots`,
    )
  }

  return Object.freeze({ values: Object.freeze(values), roomMatch })
}

function candidate(room: Room, slot: TimeSlot, instructor: { id: InstructorId; name: string }): DomainValue {
  return Object.freeze({
    roomId: room.id,
    timeslotId: slot.id,
    day: slot.day,
    start: slot.start,
    end: slot.end,
    instructorId: instructor.id,
    instructorName: instructor.name,
  })
}

export function computeDomains(
  model: TimetableModel,
  variables: readonly Variable[],
  options: DomainOptions = {},
): Map<VariableKey, VariableDomain> {
  const domains = new Map<VariableKey, VariableDomain>()
  for (const variable of variables) {
    domains.set(variable.key, computeDomain(model, variable, options))
  }
  return domains
}

/** Variables and their domains, fixed for the lifetime of a solve. */
export function createProblem(model: TimetableModel, options: DomainOptions = {}): TimetableProblem {
  const variables = Object.freeze(createVariables(model))
  return Object.freeze({
    model,
    variables,
    domains: computeDomains(model, variables, options),
  })
}

export function isPlaceholderInstructor(id: InstructorId): boolean {
  return id === UNASSIGNED_INSTRUCTOR_ID
}
