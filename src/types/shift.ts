export type DayKey = `${number}-${number}-${number}`

export interface HourMinute {
  hour: number
  minute: number
}

export type ShiftDuration =
  | {
      type: 'all-day'
    }
  | {
      type: 'scheduled'
      from: HourMinute
      to: HourMinute
    }

export interface Location {
  id: string
  name: string
  address: string
}

export interface ShiftType {
  id: string
  symbol: string
  title: string
  description: string
  duration: ShiftDuration
  location: Location | null
}

export interface ScheduledShift {
  id: string
  eventIdentifier: string
  shiftType: ShiftType | null
  date: Date
  notes: string | null
}

/** Flattened view of a scheduled shift, all the month grid needs. */
export interface ShiftRecord {
  date: Date
  shiftTypeSymbol: string
  isAllDay: boolean
}

export interface DayAggregate {
  date: Date
  hasShift: boolean
  isAllDayShift: boolean
  displaySymbol: string | null
}

export type SelectionMode = 'add' | 'delete'

export interface SelectionState {
  mode: SelectionMode | null
  selectedDates: ReadonlySet<DayKey>
}

/** How bulk add picks shift types: one for every selected day, or one per day. */
export type BulkAddMode = 'same-shift' | 'per-date'

export interface ShiftAssignment {
  dateKey: DayKey
  shiftType: ShiftType
  notes?: string | null
}

export interface ShiftFilter {
  shiftTypeId: string | null
  locationId: string | null
}
