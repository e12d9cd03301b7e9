import type { CalendarCell, CellPresentation, MonthViewCell } from '../../types/calendar'
import type { DayAggregate, DayKey, SelectionState, ShiftRecord } from '../../types/shift'
import { formatDateKey } from '../../utils/date'
import { aggregateByDay, formatDisplaySymbol } from '../../utils/shift-aggregation'
import { buildMonthGrid, collectDatedIndices, resolveEdges } from './month-calendar-utils'

export interface CellContext {
  focusedDateKey: DayKey
  todayDateKey: DayKey
}

export interface MonthViewOptions extends CellContext {
  firstWeekday: number
}

export function classifyCell(
  cell: CalendarCell,
  aggregate: DayAggregate | null,
  selection: SelectionState,
  context: CellContext,
): CellPresentation {
  if (!cell.date) {
    return { kind: 'blank', index: cell.index }
  }

  const dateKey = formatDateKey(cell.date)
  const hasShift = aggregate?.hasShift ?? false
  const isToday = dateKey === context.todayDateKey

  // Bulk add only targets days that are still empty.
  if (selection.mode === 'add' && !hasShift) {
    return {
      kind: 'selectable-empty-target',
      index: cell.index,
      date: cell.date,
      dateKey,
      day: cell.date.getDate(),
      isSelected: selection.selectedDates.has(dateKey),
      isToday,
      interaction: { type: 'toggle-date-selection', dateKey },
    }
  }

  const symbol = hasShift ? aggregate?.displaySymbol ?? null : null
  return {
    kind: 'day',
    index: cell.index,
    date: cell.date,
    dateKey,
    day: cell.date.getDate(),
    hasShift,
    isAllDayShift: aggregate?.isAllDayShift ?? false,
    displaySymbol: symbol === null ? null : formatDisplaySymbol(symbol),
    isSelectedDate: dateKey === context.focusedDateKey,
    isToday,
    interaction: { type: 'select-date', dateKey },
  }
}

export function buildMonthView(
  month: Date,
  shifts: readonly ShiftRecord[],
  selection: SelectionState,
  options: MonthViewOptions,
): MonthViewCell[] {
  const cells = buildMonthGrid(month, options.firstWeekday)
  const aggregates = aggregateByDay(shifts)
  const datedIndices = collectDatedIndices(cells)

  return cells.map((cell) => {
    const aggregate = cell.date ? aggregates.get(formatDateKey(cell.date)) ?? null : null
    return {
      presentation: classifyCell(cell, aggregate, selection, options),
      edges: resolveEdges(cell.index, datedIndices),
    }
  })
}
