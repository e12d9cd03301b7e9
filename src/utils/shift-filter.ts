import type { Location, ScheduledShift, ShiftFilter, ShiftType } from '../types/shift'

export const EMPTY_SHIFT_FILTER: ShiftFilter = { shiftTypeId: null, locationId: null }

export function hasActiveFilter(filter: ShiftFilter): boolean {
  return filter.shiftTypeId !== null || filter.locationId !== null
}

/** Shifts without a shift type never match an active filter. */
export function filterShifts(shifts: readonly ScheduledShift[], filter: ShiftFilter): ScheduledShift[] {
  return shifts.filter((shift) => {
    if (filter.shiftTypeId !== null && shift.shiftType?.id !== filter.shiftTypeId) {
      return false
    }
    if (filter.locationId !== null && shift.shiftType?.location?.id !== filter.locationId) {
      return false
    }
    return true
  })
}

export function collectLocations(shiftTypes: readonly ShiftType[]): Location[] {
  const byId = new Map<string, Location>()
  for (const shiftType of shiftTypes) {
    if (shiftType.location && !byId.has(shiftType.location.id)) {
      byId.set(shiftType.location.id, shiftType.location)
    }
  }
  return [...byId.values()]
}
