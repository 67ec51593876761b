/**
 * Catalog Diagnostics
 *
 * Pre-solve reports that point at the usual causes of an unsolvable catalog:
 * sections too large for every room, missing room types, courses nobody can
 * teach, and thin timeslot grids.
 */

import type { TimetableModel } from './catalog'
import type { RoomMatch, TimetableProblem } from './domains'
import { TEACHING_DAYS, type TeachingDay } from './time-date'
import type { CourseId, InstructorId, RoomId, SectionId } from './types'
import { compareIds, countBy } from './internal/helpers'

// ============================================================================
// Section / Room Capacity
// ============================================================================

export type SectionRoomCompatibility = {
  sectionId: SectionId
  studentCount: number
  /** Rooms of any type seating the whole section, catalog order */
  rooms: RoomId[]
}

export function sectionRoomCompatibility(model: TimetableModel): SectionRoomCompatibility[] {
  const rooms = [...model.rooms.values()]
  return [...model.sections.values()].map(section => ({
    sectionId: section.id,
    studentCount: section.studentCount,
    rooms: rooms.filter(room => room.capacity >= section.studentCount).map(room => room.id),
  }))
}

// ============================================================================
// Room Types
// ============================================================================

export type RoomTypeWarning = 'noLabRooms' | 'labRoomsScarce' | 'noLectureRooms'

export type RoomTypeSummary = {
  lectureCourses: number
  labCourses: number
  totalCourses: number
  lectureRooms: number
  labRooms: number
  totalRooms: number
  warnings: RoomTypeWarning[]
}

/** Lab courses per lab room above which labs are flagged as scarce */
const LAB_PRESSURE_RATIO = 3

function mentions(tag: string, word: string): boolean {
  return tag.toLowerCase().includes(word)
}

/**
 * Counts by substring, so a combined "Lecture and Lab" course counts on
 * both sides.
 */
export function roomTypeSummary(model: TimetableModel): RoomTypeSummary {
  const courses = [...model.courses.values()]
  const rooms = [...model.rooms.values()]

  const lectureCourses = courses.filter(c => mentions(c.type, 'lecture')).length
  const labCourses = courses.filter(c => mentions(c.type, 'lab')).length
  const lectureRooms = rooms.filter(r => mentions(r.type, 'lecture')).length
  const labRooms = rooms.filter(r => mentions(r.type, 'lab')).length

  const warnings: RoomTypeWarning[] = []
  if (labRooms === 0 && labCourses > 0) warnings.push('noLabRooms')
  else if (labCourses > labRooms * LAB_PRESSURE_RATIO) warnings.push('labRoomsScarce')
  if (lectureRooms === 0) warnings.push('noLectureRooms')

  return {
    lectureCourses,
    labCourses,
    totalCourses: courses.length,
    lectureRooms,
    labRooms,
    totalRooms: rooms.length,
    warnings,
  }
}

// ============================================================================
// Instructor Coverage
// ============================================================================

export type InstructorQualificationReport = {
  instructors: Array<{ id: InstructorId; name: string; qualifiedCount: number }>
  totalQualifications: number
  averageQualifications: number
  coveredCourses: number
  totalCourses: number
  /** Sorted by id */
  uncoveredCourses: CourseId[]
}

export function instructorQualificationReport(model: TimetableModel): InstructorQualificationReport {
  const instructors = [...model.instructors.values()]
  const covered = new Set<CourseId>()
  let totalQualifications = 0

  for (const instructor of instructors) {
    totalQualifications += instructor.qualifiedCourses.length
    for (const id of instructor.qualifiedCourses) covered.add(id)
  }

  const uncoveredCourses = [...model.courses.keys()]
    .filter(id => !covered.has(id))
    .sort(compareIds)

  return {
    instructors: instructors.map(i => ({ id: i.id, name: i.name, qualifiedCount: i.qualifiedCourses.length })),
    totalQualifications,
    averageQualifications: instructors.length > 0 ? totalQualifications / instructors.length : 0,
    coveredCourses: covered.size,
    totalCourses: model.courses.size,
    uncoveredCourses,
  }
}

// ============================================================================
// Timeslots
// ============================================================================

export type TimeslotSummary = {
  /** Teaching-day order, days without slots omitted */
  days: Array<{ day: TeachingDay; slots: number }>
  totalSlots: number
}

export function timeslotSummary(model: TimetableModel): TimeslotSummary {
  const perDay = countBy(model.timeslots, slot => slot.day)
  const days: TimeslotSummary['days'] = []
  for (const day of TEACHING_DAYS) {
    const slots = perDay.get(day) ?? 0
    if (slots > 0) days.push({ day, slots })
  }
  return { days, totalSlots: model.timeslots.length }
}

// ============================================================================
// Domains
// ============================================================================

export type DomainSummary = {
  variables: number
  totalCandidates: number
  averageDomainSize: number
  smallestDomain: number
  largestDomain: number
  /** Variables per room relaxation step */
  byRoomMatch: Record<RoomMatch, number>
}

export function domainSummary(problem: TimetableProblem): DomainSummary {
  const byRoomMatch: Record<RoomMatch, number> = { matched: 0, capacityRelaxed: 0, fallback: 0 }
  const sizes: number[] = []

  for (const variable of problem.variables) {
    const domain = problem.domains.get(variable.key)
    if (!domain) continue
    sizes.push(domain.values.length)
    byRoomMatch[domain.roomMatch]++
  }

  const totalCandidates = sizes.reduce((sum, n) => sum + n, 0)
  return {
    variables: problem.variables.length,
    totalCandidates,
    averageDomainSize: sizes.length > 0 ? totalCandidates / sizes.length : 0,
    smallestDomain: sizes.reduce((min, n) => Math.min(min, n), sizes[0] ?? 0),
    largestDomain: sizes.reduce((max, n) => Math.max(max, n), 0),
    byRoomMatch,
  }
}
