import { useCallback, useMemo, useReducer } from 'react'
import type { CellInteraction } from '../types/calendar'
import type {
  BulkAddMode,
  DayKey,
  SelectionMode,
  SelectionState,
  ShiftAssignment,
  ShiftFilter,
  ShiftType,
} from '../types/shift'
import { formatDateKey, isSameMonth, parseDateKey, shiftMonth, toMonthStart } from '../utils/date'
import { EMPTY_SHIFT_FILTER } from '../utils/shift-filter'

export interface CalendarSelectionState {
  focusedDateKey: DayKey
  displayedMonth: Date
  mode: SelectionMode | null
  selectedDates: ReadonlySet<DayKey>
  selectedShiftIds: ReadonlySet<string>
  bulkAddMode: BulkAddMode
  /** Per-day shift types chosen in `per-date` bulk add; keys are always selected dates. */
  dateShiftAssignments: ReadonlyMap<DayKey, ShiftType>
  filter: ShiftFilter
}

export type CalendarSelectionAction =
  | { type: 'date-focused'; dateKey: DayKey }
  | { type: 'month-shifted'; offset: number }
  | { type: 'month-picked'; year: number; monthIndex: number }
  | { type: 'jumped-to-today'; todayKey: DayKey }
  | { type: 'selection-mode-entered'; mode: SelectionMode; firstId?: string }
  | { type: 'selection-mode-exited' }
  | { type: 'date-selection-toggled'; dateKey: DayKey }
  | { type: 'shift-selection-toggled'; shiftId: string }
  | { type: 'selected-dates-cleared' }
  | { type: 'bulk-add-mode-changed'; bulkAddMode: BulkAddMode }
  | { type: 'shift-assigned-to-date'; dateKey: DayKey; shiftType: ShiftType }
  | { type: 'shift-assignment-removed'; dateKey: DayKey }
  | { type: 'filter-changed'; filter: Partial<ShiftFilter> }
  | { type: 'filters-cleared' }

const EMPTY_DATES: ReadonlySet<DayKey> = new Set<DayKey>()
const EMPTY_SHIFT_IDS: ReadonlySet<string> = new Set<string>()
const EMPTY_ASSIGNMENTS: ReadonlyMap<DayKey, ShiftType> = new Map<DayKey, ShiftType>()

export function createCalendarSelectionState(today: Date = new Date()): CalendarSelectionState {
  return {
    focusedDateKey: formatDateKey(today),
    displayedMonth: toMonthStart(today),
    mode: null,
    selectedDates: EMPTY_DATES,
    selectedShiftIds: EMPTY_SHIFT_IDS,
    bulkAddMode: 'same-shift',
    dateShiftAssignments: EMPTY_ASSIGNMENTS,
    filter: EMPTY_SHIFT_FILTER,
  }
}

function toggleMember<T>(set: ReadonlySet<T>, value: T): Set<T> {
  const next = new Set(set)
  if (next.has(value)) {
    next.delete(value)
  } else {
    next.add(value)
  }
  return next
}

function toggleDateSelection(state: CalendarSelectionState, dateKey: DayKey): CalendarSelectionState {
  const selectedDates = toggleMember(state.selectedDates, dateKey)
  if (selectedDates.has(dateKey) || !state.dateShiftAssignments.has(dateKey)) {
    return { ...state, selectedDates }
  }
  const dateShiftAssignments = new Map(state.dateShiftAssignments)
  dateShiftAssignments.delete(dateKey)
  return { ...state, selectedDates, dateShiftAssignments }
}

function focusDate(state: CalendarSelectionState, dateKey: DayKey): CalendarSelectionState {
  const date = parseDateKey(dateKey)
  if (!date) {
    return state
  }
  const displayedMonth = isSameMonth(date, state.displayedMonth) ? state.displayedMonth : toMonthStart(date)
  return { ...state, focusedDateKey: dateKey, displayedMonth }
}

export function calendarSelectionReducer(
  state: CalendarSelectionState,
  action: CalendarSelectionAction,
): CalendarSelectionState {
  switch (action.type) {
    case 'date-focused':
      return focusDate(state, action.dateKey)
    case 'month-shifted':
      return { ...state, displayedMonth: shiftMonth(state.displayedMonth, action.offset) }
    case 'month-picked':
      return { ...state, displayedMonth: new Date(action.year, action.monthIndex, 1) }
    case 'jumped-to-today':
      return focusDate(state, action.todayKey)
    case 'selection-mode-entered':
      if (state.mode !== null) {
        return state
      }
      return {
        ...state,
        mode: action.mode,
        selectedDates: EMPTY_DATES,
        selectedShiftIds:
          action.mode === 'delete' && action.firstId ? new Set([action.firstId]) : EMPTY_SHIFT_IDS,
      }
    case 'selection-mode-exited':
      return {
        ...state,
        mode: null,
        selectedDates: EMPTY_DATES,
        selectedShiftIds: EMPTY_SHIFT_IDS,
        bulkAddMode: 'same-shift',
        dateShiftAssignments: EMPTY_ASSIGNMENTS,
      }
    case 'date-selection-toggled':
      if (state.mode !== 'add') {
        return state
      }
      return toggleDateSelection(state, action.dateKey)
    case 'shift-selection-toggled':
      if (state.mode !== 'delete') {
        return state
      }
      return { ...state, selectedShiftIds: toggleMember(state.selectedShiftIds, action.shiftId) }
    case 'selected-dates-cleared':
      if (state.selectedDates.size === 0) {
        return state
      }
      return { ...state, selectedDates: EMPTY_DATES, dateShiftAssignments: EMPTY_ASSIGNMENTS }
    case 'bulk-add-mode-changed':
      if (state.bulkAddMode === action.bulkAddMode) {
        return state
      }
      return { ...state, bulkAddMode: action.bulkAddMode, dateShiftAssignments: EMPTY_ASSIGNMENTS }
    case 'shift-assigned-to-date': {
      if (state.mode !== 'add' || state.bulkAddMode !== 'per-date' || !state.selectedDates.has(action.dateKey)) {
        return state
      }
      const dateShiftAssignments = new Map(state.dateShiftAssignments)
      dateShiftAssignments.set(action.dateKey, action.shiftType)
      return { ...state, dateShiftAssignments }
    }
    case 'shift-assignment-removed': {
      if (!state.dateShiftAssignments.has(action.dateKey)) {
        return state
      }
      const dateShiftAssignments = new Map(state.dateShiftAssignments)
      dateShiftAssignments.delete(action.dateKey)
      return { ...state, dateShiftAssignments }
    }
    case 'filter-changed':
      return { ...state, filter: { ...state.filter, ...action.filter } }
    case 'filters-cleared':
      return { ...state, filter: EMPTY_SHIFT_FILTER }
  }
}

export function selectionCount(state: CalendarSelectionState): number {
  switch (state.mode) {
    case 'add':
      return state.selectedDates.size
    case 'delete':
      return state.selectedShiftIds.size
    default:
      return 0
  }
}

export function canAddToSelectedDates(state: CalendarSelectionState): boolean {
  if (state.mode !== 'add' || state.selectedDates.size === 0) {
    return false
  }
  return state.bulkAddMode === 'same-shift' || state.dateShiftAssignments.size === state.selectedDates.size
}

/**
 * Assignments to create for the current add selection, sorted by day.
 * Days in `occupiedDays` are dropped: a day that already holds a shift is never a bulk-add target.
 */
export function buildBulkAssignments(
  state: CalendarSelectionState,
  sharedShiftType: ShiftType | null,
  occupiedDays: ReadonlyMap<DayKey, unknown>,
): ShiftAssignment[] {
  if (state.mode !== 'add') {
    return []
  }
  const assignments: ShiftAssignment[] = []
  for (const dateKey of [...state.selectedDates].sort()) {
    const shiftType = state.bulkAddMode === 'per-date' ? state.dateShiftAssignments.get(dateKey) : sharedShiftType
    if (shiftType && !occupiedDays.has(dateKey)) {
      assignments.push({ dateKey, shiftType })
    }
  }
  return assignments
}

export function canDeleteSelectedShifts(state: CalendarSelectionState): boolean {
  return state.mode === 'delete' && state.selectedShiftIds.size > 0
}

export interface UseCalendarSelectionResult {
  state: CalendarSelectionState
  selection: SelectionState
  dispatch: (action: CalendarSelectionAction) => void
  handleInteraction: (interaction: CellInteraction) => void
}

export function useCalendarSelection(initialToday?: Date): UseCalendarSelectionResult {
  const [state, dispatch] = useReducer(calendarSelectionReducer, initialToday, createCalendarSelectionState)

  const selection = useMemo<SelectionState>(
    () => ({ mode: state.mode, selectedDates: state.selectedDates }),
    [state.mode, state.selectedDates],
  )

  const handleInteraction = useCallback((interaction: CellInteraction) => {
    if (interaction.type === 'toggle-date-selection') {
      dispatch({ type: 'date-selection-toggled', dateKey: interaction.dateKey })
      return
    }
    dispatch({ type: 'date-focused', dateKey: interaction.dateKey })
  }, [])

  return { state, selection, dispatch, handleInteraction }
}
