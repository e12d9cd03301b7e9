import type { ScheduledShift, ShiftAssignment, ShiftType } from '../types/shift'
import { formatDateKey, parseDateKey, startOfDay } from '../utils/date'

export interface ShiftSource {
  /** Shifts whose day falls within `[start, end]`, both inclusive at day granularity. */
  listShiftsInRange: (start: Date, end: Date) => Promise<ScheduledShift[]>
  /**
   * Creates one shift per assignment. A single add is a one-element list.
   * Rejects without creating anything when a day already holds a shift of the same type.
   */
  addShifts: (assignments: readonly ShiftAssignment[]) => Promise<ScheduledShift[]>
  /** Resolves to the number of shifts actually removed. */
  deleteShifts: (shiftIds: readonly string[]) => Promise<number>
  /** Switches a shift to another type on the same day, keeping its event identifier. */
  replaceShiftType: (shiftId: string, shiftType: ShiftType) => Promise<ScheduledShift>
}

function isWithinDayRange(date: Date, start: Date, end: Date): boolean {
  const day = startOfDay(date).getTime()
  return day >= startOfDay(start).getTime() && day <= startOfDay(end).getTime()
}

function shiftStartOn(day: Date, shiftType: ShiftType): Date {
  if (shiftType.duration.type === 'all-day') {
    return day
  }
  const { hour, minute } = shiftType.duration.from
  return new Date(day.getFullYear(), day.getMonth(), day.getDate(), hour, minute)
}

function duplicateKey(dateKey: string, shiftTypeId: string): string {
  return `${dateKey}|${shiftTypeId}`
}

function copyShift(shift: ScheduledShift): ScheduledShift {
  return { ...shift, date: new Date(shift.date.getTime()) }
}

export function createInMemoryShiftSource(seed: readonly ScheduledShift[] = []): ShiftSource {
  let shifts = seed.map(copyShift)
  let sequence = 0

  const occupiedKeys = (exceptId?: string) =>
    new Set(
      shifts
        .filter((shift) => shift.id !== exceptId && shift.shiftType)
        .map((shift) => duplicateKey(formatDateKey(shift.date), shift.shiftType?.id ?? '')),
    )

  return {
    async listShiftsInRange(start, end) {
      if (end.getTime() < start.getTime()) {
        throw new RangeError('查询区间结束时间早于开始时间')
      }
      return shifts
        .filter((shift) => isWithinDayRange(shift.date, start, end))
        .sort((left, right) => left.date.getTime() - right.date.getTime())
        .map(copyShift)
    },

    async addShifts(assignments) {
      const occupied = occupiedKeys()
      const sorted = [...assignments].sort((left, right) => left.dateKey.localeCompare(right.dateKey))
      const pending: Array<{ day: Date; assignment: ShiftAssignment }> = []

      for (const assignment of sorted) {
        const day = parseDateKey(assignment.dateKey)
        if (!day) {
          throw new Error(`无效日期: ${assignment.dateKey}`)
        }
        const key = duplicateKey(assignment.dateKey, assignment.shiftType.id)
        if (occupied.has(key)) {
          throw new Error(`${assignment.dateKey} 已有${assignment.shiftType.title}`)
        }
        occupied.add(key)
        pending.push({ day, assignment })
      }

      const created = pending.map(({ day, assignment }): ScheduledShift => {
        sequence += 1
        const id = `local-${sequence}`
        return {
          id,
          eventIdentifier: `event:${id}`,
          shiftType: assignment.shiftType,
          date: shiftStartOn(day, assignment.shiftType),
          notes: assignment.notes?.trim() || null,
        }
      })
      shifts = [...shifts, ...created]
      return created.map(copyShift)
    },

    async deleteShifts(shiftIds) {
      const ids = new Set(shiftIds)
      const remaining = shifts.filter((shift) => !ids.has(shift.id))
      const removed = shifts.length - remaining.length
      shifts = remaining
      return removed
    },

    async replaceShiftType(shiftId, shiftType) {
      const current = shifts.find((shift) => shift.id === shiftId)
      if (!current) {
        throw new Error(`班次不存在: ${shiftId}`)
      }
      const dateKey = formatDateKey(current.date)
      if (occupiedKeys(shiftId).has(duplicateKey(dateKey, shiftType.id))) {
        throw new Error(`${dateKey} 已有${shiftType.title}`)
      }

      const switched: ScheduledShift = {
        ...current,
        shiftType,
        date: shiftStartOn(startOfDay(current.date), shiftType),
      }
      shifts = shifts.map((shift) => (shift.id === shiftId ? switched : shift))
      return copyShift(switched)
    },
  }
}
