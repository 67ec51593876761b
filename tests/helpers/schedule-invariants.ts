/**
 * Shared schedule invariant assertions for every test that solves.
 */
import { expect } from 'vitest'
import type { ScheduleRow } from '../../src/projection'
import { UNASSIGNED_INSTRUCTOR_ID } from '../../src/types'

/**
 * Asserts the three clash rules pairwise over projected rows:
 * 1. No (room, timeslot) is used twice
 * 2. No real instructor teaches twice in one timeslot
 * 3. No section attends twice in one timeslot
 */
export function assertNoClashes(rows: readonly ScheduleRow[]): void {
  const roomSlots = new Set<string>()
  const instructorSlots = new Set<string>()
  const sectionSlots = new Set<string>()

  for (const row of rows) {
    const room = `${row.Room}@${row.TimeSlot_ID}`
    expect(roomSlots.has(room), `room clash ${room}`).toBe(false)
    roomSlots.add(room)

    if (row.Instructor_ID !== UNASSIGNED_INSTRUCTOR_ID) {
      const busy = `${row.Instructor_ID}@${row.TimeSlot_ID}`
      expect(instructorSlots.has(busy), `instructor clash ${busy}`).toBe(false)
      instructorSlots.add(busy)
    }

    const group = `${row.Section_ID}@${row.TimeSlot_ID}`
    expect(sectionSlots.has(group), `section clash ${group}`).toBe(false)
    sectionSlots.add(group)
  }
}
