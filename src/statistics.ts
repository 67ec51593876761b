/**
 * Schedule Statistics
 */

import type { ScheduleRow } from './projection'
import { TEACHING_DAYS, type TeachingDay } from './time-date'
import { countBy, countDistinct } from './internal/helpers'

export type ScheduleSummary = {
  totalClasses: number
  uniqueCourses: number
  uniqueSections: number
  instructors: number
  roomsUsed: number
  /** In order of first appearance */
  byActivityType: Array<{ type: string; count: number }>
  /** Teaching-day order, empty days omitted */
  byDay: Array<{ day: TeachingDay; count: number }>
}

export function summarizeSchedule(rows: readonly ScheduleRow[]): ScheduleSummary {
  const types = countBy(rows, r => r.Activity_Type)
  const days = countBy(rows, r => r.Day)

  const byDay: ScheduleSummary['byDay'] = []
  for (const day of TEACHING_DAYS) {
    const count = days.get(day) ?? 0
    if (count > 0) byDay.push({ day, count })
  }

  return {
    totalClasses: rows.length,
    uniqueCourses: countDistinct(rows, r => r.Course_Code),
    uniqueSections: countDistinct(rows, r => r.Section_ID),
    instructors: countDistinct(rows, r => r.Instructor_ID),
    roomsUsed: countDistinct(rows, r => r.Room),
    byActivityType: [...types].map(([type, count]) => ({ type, count })),
    byDay,
  }
}
