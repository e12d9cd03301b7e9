import type { DayAggregate, DayKey, ScheduledShift, ShiftDuration, ShiftRecord } from '../types/shift'
import { formatDateKey, formatHourMinute, startOfDay } from './date'

export const MISSING_SHIFT_SYMBOL = '?'
export const MAX_DISPLAY_SYMBOL_LENGTH = 3
const ELLIPSIS = '…'

const graphemeSegmenter = new Intl.Segmenter(undefined, { granularity: 'grapheme' })

export function isAllDayDuration(duration: ShiftDuration): boolean {
  return duration.type === 'all-day'
}

export function formatTimeRange(duration: ShiftDuration): string {
  if (duration.type === 'all-day') {
    return '全天'
  }
  const from = formatHourMinute(duration.from.hour, duration.from.minute)
  const to = formatHourMinute(duration.to.hour, duration.to.minute)
  return `${from} - ${to}`
}

export function toShiftRecord(shift: ScheduledShift): ShiftRecord {
  if (!shift.shiftType) {
    return { date: shift.date, shiftTypeSymbol: MISSING_SHIFT_SYMBOL, isAllDay: false }
  }
  return {
    date: shift.date,
    shiftTypeSymbol: shift.shiftType.symbol,
    isAllDay: isAllDayDuration(shift.shiftType.duration),
  }
}

/** Emoji and other multi-code-point symbols count as one character. */
export function formatDisplaySymbol(symbol: string): string {
  const characters = Array.from(graphemeSegmenter.segment(symbol), (part) => part.segment)
  if (characters.length <= MAX_DISPLAY_SYMBOL_LENGTH) {
    return symbol
  }
  return `${characters.slice(0, MAX_DISPLAY_SYMBOL_LENGTH).join('')}${ELLIPSIS}`
}

interface DayGroup {
  aggregate: DayAggregate
  representativeTime: number
}

/**
 * Groups shift records by local calendar day.
 *
 * The day's symbol comes from the record with the earliest timestamp; records
 * sharing a timestamp keep input order.
 */
export function aggregateByDay(shifts: readonly ShiftRecord[]): Map<DayKey, DayAggregate> {
  const groups = new Map<DayKey, DayGroup>()

  for (const shift of shifts) {
    const key = formatDateKey(shift.date)
    const time = shift.date.getTime()
    const existing = groups.get(key)

    if (!existing) {
      groups.set(key, {
        aggregate: {
          date: startOfDay(shift.date),
          hasShift: true,
          isAllDayShift: shift.isAllDay,
          displaySymbol: shift.shiftTypeSymbol,
        },
        representativeTime: time,
      })
      continue
    }

    existing.aggregate.isAllDayShift = existing.aggregate.isAllDayShift || shift.isAllDay
    if (time < existing.representativeTime) {
      existing.aggregate.displaySymbol = shift.shiftTypeSymbol
      existing.representativeTime = time
    }
  }

  return new Map(Array.from(groups, ([key, group]) => [key, group.aggregate]))
}

export function groupShiftsByDay(shifts: readonly ScheduledShift[]): Map<DayKey, ScheduledShift[]> {
  const grouped = new Map<DayKey, ScheduledShift[]>()
  for (const shift of shifts) {
    const key = formatDateKey(shift.date)
    const bucket = grouped.get(key)
    if (bucket) {
      bucket.push(shift)
    } else {
      grouped.set(key, [shift])
    }
  }
  return grouped
}
