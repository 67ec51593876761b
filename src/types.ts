/**
 * Shared Types
 *
 * Branded catalog ID types used across modules.
 */

export type { LocalTime, TeachingDay } from './time-date'

// ============================================================================
// Branded ID Types
// ============================================================================

declare const __courseId: unique symbol
declare const __instructorId: unique symbol
declare const __roomId: unique symbol
declare const __timeSlotId: unique symbol
declare const __sectionId: unique symbol
declare const __variableKey: unique symbol

export type CourseId = string & { readonly [__courseId]: true }
export type InstructorId = string & { readonly [__instructorId]: true }
export type RoomId = string & { readonly [__roomId]: true }
export type TimeSlotId = string & { readonly [__timeSlotId]: true }
export type SectionId = string & { readonly [__sectionId]: true }

/** `${sectionId}_${courseId}` */
export type VariableKey = string & { readonly [__variableKey]: true }

// ============================================================================
// Constructors
// ============================================================================

export function courseId(id: string): CourseId {
  return id as CourseId
}

export function instructorId(id: string): InstructorId {
  return id as InstructorId
}

export function roomId(id: string): RoomId {
  return id as RoomId
}

export function timeSlotId(id: string): TimeSlotId {
  return id as TimeSlotId
}

export function sectionId(id: string): SectionId {
  return id as SectionId
}

export function variableKey(section: SectionId, course: CourseId): VariableKey {
  return `${section}_${course}` as VariableKey
}

/** Synthetic instructor used when nobody is qualified; exempt from instructor clashes. */
export const UNASSIGNED_INSTRUCTOR_ID = instructorId('UNASSIGNED')
export const UNASSIGNED_INSTRUCTOR_NAME = 'Unassigned'
