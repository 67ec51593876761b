/**
 * Catalog Model Builder
 *
 * Normalizes raw catalog records (as a tabular loader hands them over) into
 * id-keyed lookup tables. Building is all-or-nothing: the first bad record
 * throws a ConstructionError and no model is returned.
 */

import { parseTime, parseTeachingDay, compareTimes, type LocalTime, type TeachingDay } from './time-date'
import {
  type CourseId, type InstructorId, type RoomId, type TimeSlotId, type SectionId,
  courseId, instructorId, roomId, timeSlotId, sectionId,
  UNASSIGNED_INSTRUCTOR_ID,
} from './types'
import { ConstructionError, type ConstructionEntity } from './errors'

export { ConstructionError } from './errors'

// ============================================================================
// Input Records
// ============================================================================

export type FieldValue = string | number | null | undefined

export type CourseRecord = {
  CourseID: FieldValue
  CourseName: FieldValue
  Type: FieldValue
  Credits: FieldValue
}

export type InstructorRecord = {
  InstructorID: FieldValue
  Name: FieldValue
  /** Comma-delimited course ids */
  QualifiedCourses: FieldValue
  PreferredSlots?: FieldValue
}

export type RoomRecord = {
  RoomID: FieldValue
  Type: FieldValue
  Capacity: FieldValue
}

export type TimeSlotRecord = {
  TimeSlotID: FieldValue
  Day: FieldValue
  StartTime: FieldValue
  EndTime: FieldValue
}

export type SectionRecord = {
  SectionID: FieldValue
  StudentCount: FieldValue
  /** Comma-delimited course ids */
  Courses: FieldValue
}

export type CatalogRecords = {
  courses: readonly CourseRecord[]
  instructors: readonly InstructorRecord[]
  rooms: readonly RoomRecord[]
  timeslots: readonly TimeSlotRecord[]
  sections: readonly SectionRecord[]
}

type RawRecord = Readonly<Record<string, FieldValue>>

// ============================================================================
// Model Types
// ============================================================================

export type Course = {
  id: CourseId
  name: string
  type: string
  credits: number
}

export type Instructor = {
  id: InstructorId
  name: string
  qualifiedCourses: readonly CourseId[]
  /** Carried through untouched; the solver is preference-blind. */
  preferredSlots: string
}

export type Room = {
  id: RoomId
  type: string
  capacity: number
}

export type TimeSlot = {
  id: TimeSlotId
  day: TeachingDay
  start: LocalTime
  end: LocalTime
}

export type Section = {
  id: SectionId
  studentCount: number
  courses: readonly CourseId[]
}

export type TimetableModel = {
  courses: ReadonlyMap<CourseId, Course>
  instructors: ReadonlyMap<InstructorId, Instructor>
  rooms: ReadonlyMap<RoomId, Room>
  timeslots: readonly TimeSlot[]
  sections: ReadonlyMap<SectionId, Section>
}

// ============================================================================
// Field Readers
// ============================================================================

/**
 * Reads a field by name, falling back to a header that only differs by
 * surrounding whitespace (`' CourseID '`).
 */
function readField(record: RawRecord, name: string): FieldValue {
  const direct = record[name]
  if (direct !== undefined) return direct
  for (const key of Object.keys(record)) {
    if (key.trim() === name && record[key] !== undefined) return record[key]
  }
  return undefined
}

function text(record: RawRecord, name: string): string {
  const value = readField(record, name)
  if (value === null || value === undefined) return ''
  return String(value).trim()
}

class RecordReader {
  constructor(
    private readonly entity: ConstructionEntity,
    private readonly record: RawRecord,
    private readonly id: string,
  ) {}

  error(field: string, message: string): ConstructionError {
    return new ConstructionError(this.entity, this.id, field, `${this.entity} '${this.id}': ${message}`)
  }

  text(field: string): string {
    return text(this.record, field)
  }

  count(field: string): number {
    const value = readField(this.record, field)
    if (typeof value === 'number') {
      if (Number.isInteger(value) && value >= 0) return value
      throw this.error(field, `${field} must be a non-negative integer, got ${value}`)
    }
    const raw = value === null || value === undefined ? '' : value.trim()
    if (!/^\d+(\.0+)?$/.test(raw)) {
      throw this.error(field, `${field} must be a non-negative integer, got '${raw}'`)
    }
    return parseInt(raw, 10)
  }

  time(field: string): LocalTime {
    const parsed = parseTime(this.text(field))
    if (!parsed.ok) throw this.error(field, parsed.error.message)
    return parsed.value
  }

  day(field: string): TeachingDay {
    const parsed = parseTeachingDay(this.text(field))
    if (!parsed.ok) throw this.error(field, parsed.error.message)
    return parsed.value
  }

  list(field: string): string[] {
    return this.text(field)
      .split(',')
      .map(entry => entry.trim())
      .filter(entry => entry.length > 0)
  }
}

function readerFor(entity: ConstructionEntity, record: RawRecord, idField: string, seen: Set<string>): RecordReader {
  const id = text(record, idField)
  if (!id) {
    throw new ConstructionError(entity, '', idField, `${entity} record is missing ${idField}`)
  }
  if (seen.has(id)) {
    throw new ConstructionError(entity, id, idField, `Duplicate ${entity} id '${id}'`)
  }
  seen.add(id)
  return new RecordReader(entity, record, id)
}

// ============================================================================
// Builders
// ============================================================================

function buildCourses(records: readonly CourseRecord[]): Map<CourseId, Course> {
  const courses = new Map<CourseId, Course>()
  const seen = new Set<string>()
  for (const record of records) {
    const r = readerFor('course', record, 'CourseID', seen)
    const id = courseId(r.text('CourseID'))
    courses.set(id, {
      id,
      name: r.text('CourseName'),
      type: r.text('Type'),
      credits: r.count('Credits'),
    })
  }
  return courses
}

/** Section course lists must not repeat an id (one variable per pair); qualification repeats collapse. */
function resolveCourses(
  r: RecordReader,
  field: string,
  courses: ReadonlyMap<CourseId, Course>,
  repeats: 'reject' | 'collapse',
): CourseId[] {
  const resolved: CourseId[] = []
  for (const entry of r.list(field)) {
    const id = courseId(entry)
    if (!courses.has(id)) throw r.error(field, `references unknown course '${entry}'`)
    if (resolved.includes(id)) {
      if (repeats === 'reject') throw r.error(field, `lists course '${entry}' more than once`)
      continue
    }
    resolved.push(id)
  }
  return resolved
}

function buildInstructors(
  records: readonly InstructorRecord[],
  courses: ReadonlyMap<CourseId, Course>,
): Map<InstructorId, Instructor> {
  const instructors = new Map<InstructorId, Instructor>()
  const seen = new Set<string>()
  for (const record of records) {
    const r = readerFor('instructor', record, 'InstructorID', seen)
    const id = instructorId(r.text('InstructorID'))
    if (id === UNASSIGNED_INSTRUCTOR_ID) throw r.error('InstructorID', `'${id}' is reserved for the placeholder instructor`)
    instructors.set(id, {
      id,
      name: r.text('Name'),
      qualifiedCourses: resolveCourses(r, 'QualifiedCourses', courses, 'collapse'),
      preferredSlots: r.text('PreferredSlots'),
    })
  }
  return instructors
}

function buildRooms(records: readonly RoomRecord[]): Map<RoomId, Room> {
  const rooms = new Map<RoomId, Room>()
  const seen = new Set<string>()
  for (const record of records) {
    const r = readerFor('room', record, 'RoomID', seen)
    const id = roomId(r.text('RoomID'))
    rooms.set(id, { id, type: r.text('Type'), capacity: r.count('Capacity') })
  }
  return rooms
}

function buildTimeSlots(records: readonly TimeSlotRecord[]): TimeSlot[] {
  const timeslots: TimeSlot[] = []
  const seen = new Set<string>()
  for (const record of records) {
    const r = readerFor('timeslot', record, 'TimeSlotID', seen)
    const start = r.time('StartTime')
    const end = r.time('EndTime')
    if (compareTimes(start, end) >= 0) throw r.error('EndTime', `EndTime ${end} is not after StartTime ${start}`)
    timeslots.push({ id: timeSlotId(r.text('TimeSlotID')), day: r.day('Day'), start, end })
  }
  return timeslots
}

function buildSections(
  records: readonly SectionRecord[],
  courses: ReadonlyMap<CourseId, Course>,
): Map<SectionId, Section> {
  const sections = new Map<SectionId, Section>()
  const seen = new Set<string>()
  for (const record of records) {
    const r = readerFor('section', record, 'SectionID', seen)
    const id = sectionId(r.text('SectionID'))
    sections.set(id, {
      id,
      studentCount: r.count('StudentCount'),
      courses: resolveCourses(r, 'Courses', courses, 'reject'),
    })
  }
  return sections
}

// ============================================================================
// Public
// ============================================================================

export function buildModel(records: CatalogRecords): TimetableModel {
  const courses = buildCourses(records.courses)
  return Object.freeze({
    courses,
    instructors: buildInstructors(records.instructors, courses),
    rooms: buildRooms(records.rooms),
    timeslots: Object.freeze(buildTimeSlots(records.timeslots)),
    sections: buildSections(records.sections, courses),
  })
}

/** Qualified instructors for a course, in catalog order. */
export function instructorsFor(model: TimetableModel, course: CourseId): Instructor[] {
  const qualified: Instructor[] = []
  for (const instructor of model.instructors.values()) {
    if (instructor.qualifiedCourses.includes(course)) qualified.push(instructor)
  }
  return qualified
}
