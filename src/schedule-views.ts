/**
 * Schedule Views
 *
 * Regroups projected rows the way timetable consumers page through them:
 * per section, per teaching day, per instructor, per room.
 */

import { compareRows, type ScheduleRow } from './projection'
import { TEACHING_DAYS } from './time-date'
import { compareIds, groupBy } from './internal/helpers'

export type ScheduleGroup = {
  key: string
  label: string
  rows: ScheduleRow[]
}

function toGroups(
  rows: readonly ScheduleRow[],
  keyOf: (row: ScheduleRow) => string,
  labelOf: (row: ScheduleRow) => string,
  order: (a: string, b: string) => number = compareIds,
): ScheduleGroup[] {
  const groups = groupBy(rows, keyOf)
  return [...groups.keys()].sort(order).map(key => {
    const members = [...(groups.get(key) ?? [])].sort(compareRows)
    const first = members[0]
    return { key, label: first ? labelOf(first) : key, rows: members }
  })
}

export function groupBySection(rows: readonly ScheduleRow[]): ScheduleGroup[] {
  return toGroups(rows, r => r.Section_ID, r => r.Section_ID)
}

/** Teaching-day order; days without classes are omitted. */
export function groupByDay(rows: readonly ScheduleRow[]): ScheduleGroup[] {
  const rank = (day: string) => TEACHING_DAYS.findIndex(d => d === day)
  return toGroups(rows, r => r.Day, r => r.Day, (a, b) => rank(a) - rank(b))
}

/** Keyed by instructor id, labelled with the instructor's name. */
export function groupByInstructor(rows: readonly ScheduleRow[]): ScheduleGroup[] {
  return toGroups(rows, r => r.Instructor_ID, r => r.Instructor)
}

export function groupByRoom(rows: readonly ScheduleRow[]): ScheduleGroup[] {
  return toGroups(rows, r => r.Room, r => r.Room)
}
