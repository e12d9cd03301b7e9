import type { DayKey } from './shift'

/** 1 = Sunday … 7 = Saturday. */
export type Weekday = 1 | 2 | 3 | 4 | 5 | 6 | 7

export interface CalendarCell {
  index: number
  date: Date | null
}

export type CellEdge = 'top' | 'bottom' | 'leading' | 'trailing'

export type EdgeSet = ReadonlySet<CellEdge>

export type CellInteraction =
  | {
      type: 'toggle-date-selection'
      dateKey: DayKey
    }
  | {
      type: 'select-date'
      dateKey: DayKey
    }

export interface BlankCellPresentation {
  kind: 'blank'
  index: number
}

export interface SelectableEmptyTargetPresentation {
  kind: 'selectable-empty-target'
  index: number
  date: Date
  dateKey: DayKey
  day: number
  isSelected: boolean
  isToday: boolean
  interaction: CellInteraction
}

export interface DayCellPresentation {
  kind: 'day'
  index: number
  date: Date
  dateKey: DayKey
  day: number
  hasShift: boolean
  isAllDayShift: boolean
  displaySymbol: string | null
  isSelectedDate: boolean
  isToday: boolean
  interaction: CellInteraction
}

export type CellPresentation =
  | BlankCellPresentation
  | SelectableEmptyTargetPresentation
  | DayCellPresentation

export interface MonthViewCell {
  presentation: CellPresentation
  edges: EdgeSet
}
