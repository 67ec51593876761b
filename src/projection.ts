/**
 * Result Projection
 *
 * Flattens an assignment into the row shape report and view collaborators
 * consume, ordered by teaching day, start time, then section.
 */

import type { TimetableProblem } from './domains'
import type { Assignment } from './search'
import { compareTimes, dayRank, type LocalTime, type TeachingDay } from './time-date'
import { compareIds } from './internal/helpers'
import { findClashes, type Clash, type Placement } from './consistency'
import { instructorId, roomId, sectionId, timeSlotId } from './types'

// ============================================================================
// Types
// ============================================================================

export type ScheduleRow = {
  Section_ID: string
  Course_Code: string
  Course_Name: string
  Activity_Type: string
  Day: TeachingDay
  Start_Time: LocalTime
  End_Time: LocalTime
  Room: string
  TimeSlot_ID: string
  Instructor: string
  Instructor_ID: string
  Student_Count: number
}

// ============================================================================
// Ordering
// ============================================================================

export function compareRows(a: ScheduleRow, b: ScheduleRow): number {
  return (
    dayRank(a.Day) - dayRank(b.Day) ||
    compareTimes(a.Start_Time, b.Start_Time) ||
    compareIds(a.Section_ID, b.Section_ID) ||
    compareIds(a.Course_Code, b.Course_Code)
  )
}

// ============================================================================
// Projection
// ============================================================================

/** Works on finished and partial assignments alike; unassigned variables are skipped. */
export function projectSchedule(problem: TimetableProblem, assignment: Assignment): ScheduleRow[] {
  const rows: ScheduleRow[] = []

  for (const variable of problem.variables) {
    const value = assignment.get(variable.key)
    if (!value) continue

    rows.push({
      Section_ID: variable.sectionId,
      Course_Code: variable.courseId,
      Course_Name: variable.courseName,
      Activity_Type: variable.courseType,
      Day: value.day,
      Start_Time: value.start,
      End_Time: value.end,
      Room: value.roomId,
      TimeSlot_ID: value.timeslotId,
      Instructor: value.instructorName,
      Instructor_ID: value.instructorId,
      Student_Count: variable.studentCount,
    })
  }

  return rows.sort(compareRows)
}

// ============================================================================
// Verification
// ============================================================================

function placementOf(row: ScheduleRow): Placement {
  return {
    roomId: roomId(row.Room),
    timeslotId: timeSlotId(row.TimeSlot_ID),
    instructorId: instructorId(row.Instructor_ID),
    sectionId: sectionId(row.Section_ID),
  }
}

/** Clashing row pairs; empty for any schedule the search produced. */
export function findScheduleClashes(rows: readonly ScheduleRow[]): Clash<ScheduleRow>[] {
  return findClashes(rows, placementOf)
}
