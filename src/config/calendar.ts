import type { Weekday } from '../types/calendar'

export const DEFAULT_FIRST_WEEKDAY: Weekday = 1

export function isWeekday(value: number): value is Weekday {
  return Number.isInteger(value) && value >= 1 && value <= 7
}

export function assertFirstWeekday(value: number): Weekday {
  if (!isWeekday(value)) {
    throw new RangeError(`firstWeekday 必须是 1-7 之间的整数，收到 ${value}`)
  }
  return value
}

/**
 * Reads the first day of the week from `VITE_FIRST_WEEKDAY`.
 *
 * Empty or non-numeric values fall back to Sunday with a warning; a number
 * that is not an integer in 1-7 is a deployment mistake and throws.
 */
export function resolveFirstWeekday(raw: string | undefined): Weekday {
  const value = raw?.trim() ?? ''
  if (!value) {
    return DEFAULT_FIRST_WEEKDAY
  }

  const parsed = Number(value)
  if (!Number.isFinite(parsed)) {
    console.warn(`VITE_FIRST_WEEKDAY 无法解析: ${value}，使用默认值 ${DEFAULT_FIRST_WEEKDAY}`)
    return DEFAULT_FIRST_WEEKDAY
  }
  return assertFirstWeekday(parsed)
}

export const CALENDAR_CONFIG = {
  firstWeekday: resolveFirstWeekday(import.meta.env.VITE_FIRST_WEEKDAY),
  locale: import.meta.env.VITE_CALENDAR_LOCALE?.trim() || 'zh-CN',
} as const
