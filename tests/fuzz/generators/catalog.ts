/**
 * Catalog generators.
 *
 * Produce small, always-valid catalogs: every reference resolves, every time
 * parses and every timeslot ends after it starts. Ids are sequential so
 * shrinking keeps them readable.
 */
import * as fc from 'fast-check'
import type { Arbitrary } from 'fast-check'
import type { CatalogRecords } from '../../../src/catalog'
import { TEACHING_DAYS } from '../../../src/time-date'
import { course, instructor, room, slot, section } from '../../helpers/catalog-fixtures'

// ============================================================================
// Vocabulary
// ============================================================================

export const COURSE_TYPES = ['Lecture', 'Lab', 'Lecture and Lab', 'Studio'] as const
export const ROOM_TYPES = ['Lecture Hall', 'Computer Lab', 'Seminar Room'] as const

const pad = (n: number) => String(n).padStart(2, '0')

// ============================================================================
// Entity Shapes
// ============================================================================

export const roomShapeGen = fc.record({
  type: fc.constantFrom(...ROOM_TYPES),
  capacity: fc.integer({ min: 10, max: 60 }),
})

export const slotShapeGen = fc.record({
  day: fc.constantFrom(...TEACHING_DAYS),
  hour: fc.integer({ min: 8, max: 16 }),
  length: fc.integer({ min: 1, max: 2 }),
})

// ============================================================================
// Catalogs
// ============================================================================

export type CatalogGenOptions = {
  maxCourses?: number
  maxRooms?: number
  maxSlots?: number
  maxInstructors?: number
  maxSections?: number
  /** Allow empty room catalogs (domain construction then throws) */
  allowNoRooms?: boolean
}

export function catalogGen(options: CatalogGenOptions = {}): Arbitrary<CatalogRecords> {
  const {
    maxCourses = 4,
    maxRooms = 4,
    maxSlots = 4,
    maxInstructors = 3,
    maxSections = 3,
    allowNoRooms = false,
  } = options

  return fc
    .record({
      courseTypes: fc.array(fc.constantFrom(...COURSE_TYPES), { minLength: 1, maxLength: maxCourses }),
      rooms: fc.array(roomShapeGen, { minLength: allowNoRooms ? 0 : 1, maxLength: maxRooms }),
      slots: fc.array(slotShapeGen, { minLength: 1, maxLength: maxSlots }),
    })
    .chain(({ courseTypes, rooms, slots }) => {
      const courseIds = courseTypes.map((_, i) => `C${i + 1}`)
      return fc
        .record({
          qualifications: fc.array(fc.subarray(courseIds), { maxLength: maxInstructors }),
          sections: fc.array(
            fc.record({
              courses: fc.subarray(courseIds, { minLength: 1 }),
              students: fc.integer({ min: 5, max: 70 }),
            }),
            { minLength: 1, maxLength: maxSections },
          ),
        })
        .map(({ qualifications, sections }) => ({
          courses: courseTypes.map((type, i) => course(`C${i + 1}`, type)),
          instructors: qualifications.map((courses, i) => instructor(`I${i + 1}`, courses)),
          rooms: rooms.map((r, i) => room(`R${i + 1}`, r.type, r.capacity)),
          timeslots: slots.map((s, i) =>
            slot(`T${i + 1}`, s.day, `${pad(s.hour)}:00`, `${pad(s.hour + s.length)}:00`)),
          sections: sections.map((s, i) => section(`S${i + 1}`, s.courses, s.students)),
        }))
    })
}
