/**
 * Constraint Checking
 *
 * Three clash rules over (room, timeslot, instructor, section):
 * - room:       same room, same timeslot
 * - instructor: same instructor, same timeslot (placeholder exempt)
 * - section:    same section, same timeslot
 */

import type { DomainValue, Variable } from './domains'
import { isPlaceholderInstructor } from './domains'
import type { SectionId, VariableKey } from './types'

// ============================================================================
// Types
// ============================================================================

export type ClashType = 'room' | 'instructor' | 'section'

/** Minimal view of an assigned slot; both DomainValue and projected rows reduce to it. */
export type Placement = Pick<DomainValue, 'roomId' | 'timeslotId' | 'instructorId'> & {
  sectionId: SectionId
}

export type Clash<T> = {
  type: ClashType
  first: T
  second: T
}

// ============================================================================
// Pairwise
// ============================================================================

export function clashBetween(a: Placement, b: Placement): ClashType | null {
  if (a.timeslotId !== b.timeslotId) return null
  if (a.roomId === b.roomId) return 'room'
  if (a.instructorId === b.instructorId && !isPlaceholderInstructor(a.instructorId)) return 'instructor'
  if (a.sectionId === b.sectionId) return 'section'
  return null
}

// ============================================================================
// Search-time Check
// ============================================================================

/**
 * True when `value` clashes with nothing already in `assignment`.
 * `sectionOf` resolves assigned variable keys back to their section.
 */
export function isConsistent(
  variable: Variable,
  value: DomainValue,
  assignment: ReadonlyMap<VariableKey, DomainValue>,
  sectionOf: (key: VariableKey) => SectionId | undefined,
): boolean {
  const placement: Placement = { ...pick(value), sectionId: variable.sectionId }

  for (const [key, assigned] of assignment) {
    const section = sectionOf(key)
    if (section === undefined) throw new Error(`Assigned variable '${key}' has no section`)
    if (clashBetween(placement, { ...pick(assigned), sectionId: section }) !== null) return false
  }

  return true
}

function pick(value: DomainValue): Pick<DomainValue, 'roomId' | 'timeslotId' | 'instructorId'> {
  return { roomId: value.roomId, timeslotId: value.timeslotId, instructorId: value.instructorId }
}

// ============================================================================
// Audit
// ============================================================================

/** Every clashing pair in a finished schedule, in input order. */
export function findClashes<T>(entries: readonly T[], placementOf: (entry: T) => Placement): Clash<T>[] {
  const clashes: Clash<T>[] = []
  const placements = entries.map(placementOf)

  for (let i = 0; i < entries.length; i++) {
    for (let j = i + 1; j < entries.length; j++) {
      const a = placements[i]
      const b = placements[j]
      const first = entries[i]
      const second = entries[j]
      if (a === undefined || b === undefined || first === undefined || second === undefined) continue
      const type = clashBetween(a, b)
      if (type) clashes.push({ type, first, second })
    }
  }

  return clashes
}
