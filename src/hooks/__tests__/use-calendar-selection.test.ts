import { act, renderHook } from '@testing-library/react'
import { describe, expect, it } from 'vitest'
import {
  buildBulkAssignments,
  calendarSelectionReducer,
  canAddToSelectedDates,
  canDeleteSelectedShifts,
  createCalendarSelectionState,
  selectionCount,
  useCalendarSelection,
  type CalendarSelectionAction,
  type CalendarSelectionState,
} from '../use-calendar-selection'
import { DEMO_SHIFT_TYPES } from '../../services/demo-data'
import type { DayKey } from '../../types/shift'
import { formatDateKey } from '../../utils/date'

const TODAY = new Date(2024, 2, 15, 9, 30)
const [MORNING, NIGHT] = DEMO_SHIFT_TYPES
const NO_OCCUPIED_DAYS = new Map<DayKey, unknown>()

function reduce(actions: CalendarSelectionAction[], state = createCalendarSelectionState(TODAY)): CalendarSelectionState {
  return actions.reduce(calendarSelectionReducer, state)
}

describe('calendarSelectionReducer', () => {
  it('初始状态聚焦今天且不在选择模式', () => {
    const state = createCalendarSelectionState(TODAY)

    expect(state.focusedDateKey).toBe('2024-03-15')
    expect(formatDateKey(state.displayedMonth)).toBe('2024-03-01')
    expect(state.mode).toBeNull()
    expect(selectionCount(state)).toBe(0)
  })

  it('聚焦其他月份的日期时应切换显示月份', () => {
    const state = reduce([{ type: 'date-focused', dateKey: '2024-04-02' }])

    expect(state.focusedDateKey).toBe('2024-04-02')
    expect(formatDateKey(state.displayedMonth)).toBe('2024-04-01')
  })

  it('同月聚焦应保留原有的显示月份对象', () => {
    const initial = createCalendarSelectionState(TODAY)
    const state = calendarSelectionReducer(initial, { type: 'date-focused', dateKey: '2024-03-02' })

    expect(state.displayedMonth).toBe(initial.displayedMonth)
  })

  it('月份切换与回到今天', () => {
    const shifted = reduce([
      { type: 'month-shifted', offset: -3 },
      { type: 'month-picked', year: 2030, monthIndex: 6 },
    ])
    expect(formatDateKey(shifted.displayedMonth)).toBe('2030-07-01')

    const back = calendarSelectionReducer(shifted, { type: 'jumped-to-today', todayKey: '2024-03-15' })
    expect(formatDateKey(back.displayedMonth)).toBe('2024-03-01')
    expect(back.focusedDateKey).toBe('2024-03-15')
  })

  it('添加模式下可切换日期勾选，时间部分不影响', () => {
    const state = reduce([
      { type: 'selection-mode-entered', mode: 'add' },
      { type: 'date-selection-toggled', dateKey: formatDateKey(new Date(2024, 2, 11, 0, 0)) },
      { type: 'date-selection-toggled', dateKey: '2024-03-12' },
      { type: 'date-selection-toggled', dateKey: formatDateKey(new Date(2024, 2, 11, 9, 0)) },
    ])

    expect([...state.selectedDates]).toEqual(['2024-03-12'])
    expect(selectionCount(state)).toBe(1)
    expect(canAddToSelectedDates(state)).toBe(true)
    expect(canDeleteSelectedShifts(state)).toBe(false)
  })

  it('非添加模式下勾选日期应被忽略', () => {
    const state = reduce([{ type: 'date-selection-toggled', dateKey: '2024-03-12' }])

    expect(state.selectedDates.size).toBe(0)
    expect(canAddToSelectedDates(state)).toBe(false)
  })

  it('删除模式以首个班次开始并可切换班次', () => {
    const state = reduce([
      { type: 'selection-mode-entered', mode: 'delete', firstId: 'shift-1' },
      { type: 'shift-selection-toggled', shiftId: 'shift-2' },
      { type: 'shift-selection-toggled', shiftId: 'shift-1' },
    ])

    expect(state.mode).toBe('delete')
    expect([...state.selectedShiftIds]).toEqual(['shift-2'])
    expect(selectionCount(state)).toBe(1)
    expect(canDeleteSelectedShifts(state)).toBe(true)
  })

  it('已在选择模式时不能直接切换到另一模式', () => {
    const state = reduce([
      { type: 'selection-mode-entered', mode: 'add' },
      { type: 'selection-mode-entered', mode: 'delete', firstId: 'shift-1' },
    ])

    expect(state.mode).toBe('add')
    expect(state.selectedShiftIds.size).toBe(0)
  })

  it('退出选择模式应清空所有选择', () => {
    const state = reduce([
      { type: 'selection-mode-entered', mode: 'add' },
      { type: 'date-selection-toggled', dateKey: '2024-03-12' },
      { type: 'selection-mode-exited' },
    ])

    expect(state.mode).toBeNull()
    expect(state.selectedDates.size).toBe(0)
    expect(selectionCount(state)).toBe(0)
  })

  it('清空已选日期是幂等的', () => {
    const withDates = reduce([
      { type: 'selection-mode-entered', mode: 'add' },
      { type: 'date-selection-toggled', dateKey: '2024-03-12' },
      { type: 'selected-dates-cleared' },
    ])
    const again = calendarSelectionReducer(withDates, { type: 'selected-dates-cleared' })

    expect(withDates.selectedDates.size).toBe(0)
    expect(withDates.mode).toBe('add')
    expect(again).toBe(withDates)
  })
})

describe('逐日指定批量添加', () => {
  const PER_DATE: CalendarSelectionAction[] = [
    { type: 'selection-mode-entered', mode: 'add' },
    { type: 'bulk-add-mode-changed', bulkAddMode: 'per-date' },
    { type: 'date-selection-toggled', dateKey: '2024-03-12' },
    { type: 'date-selection-toggled', dateKey: '2024-03-11' },
  ]

  it('每个已选日期都指定班次后才可确认', () => {
    const partial = reduce([...PER_DATE, { type: 'shift-assigned-to-date', dateKey: '2024-03-12', shiftType: NIGHT }])
    expect(canAddToSelectedDates(partial)).toBe(false)

    const complete = calendarSelectionReducer(partial, {
      type: 'shift-assigned-to-date',
      dateKey: '2024-03-11',
      shiftType: MORNING,
    })
    expect(canAddToSelectedDates(complete)).toBe(true)
    expect(buildBulkAssignments(complete, null, NO_OCCUPIED_DAYS)).toEqual([
      { dateKey: '2024-03-11', shiftType: MORNING },
      { dateKey: '2024-03-12', shiftType: NIGHT },
    ])
  })

  it('未勾选的日期不能指定班次，取消勾选会移除指定', () => {
    const state = reduce([
      ...PER_DATE,
      { type: 'shift-assigned-to-date', dateKey: '2024-03-20', shiftType: MORNING },
      { type: 'shift-assigned-to-date', dateKey: '2024-03-11', shiftType: MORNING },
      { type: 'date-selection-toggled', dateKey: '2024-03-11' },
    ])

    expect([...state.dateShiftAssignments.keys()]).toEqual([])
    expect([...state.selectedDates]).toEqual(['2024-03-12'])
  })

  it('移除指定与切换模式都会清空对应的指定', () => {
    const assigned = reduce([...PER_DATE, { type: 'shift-assigned-to-date', dateKey: '2024-03-12', shiftType: NIGHT }])

    const removed = calendarSelectionReducer(assigned, { type: 'shift-assignment-removed', dateKey: '2024-03-12' })
    expect(removed.dateShiftAssignments.size).toBe(0)
    expect(calendarSelectionReducer(removed, { type: 'shift-assignment-removed', dateKey: '2024-03-12' })).toBe(removed)

    const switched = calendarSelectionReducer(assigned, { type: 'bulk-add-mode-changed', bulkAddMode: 'same-shift' })
    expect(switched.bulkAddMode).toBe('same-shift')
    expect(switched.dateShiftAssignments.size).toBe(0)
    expect(switched.selectedDates.size).toBe(2)
  })

  it('退出选择模式后恢复为统一班次', () => {
    const state = reduce([...PER_DATE, { type: 'selection-mode-exited' }])

    expect(state.bulkAddMode).toBe('same-shift')
    expect(state.dateShiftAssignments.size).toBe(0)
  })
})

describe('buildBulkAssignments', () => {
  it('统一班次模式使用共同的班次类型并跳过已有班次的日期', () => {
    const state = reduce([
      { type: 'selection-mode-entered', mode: 'add' },
      { type: 'date-selection-toggled', dateKey: '2024-03-10' },
      { type: 'date-selection-toggled', dateKey: '2024-03-11' },
    ])
    const occupied = new Map<DayKey, unknown>([['2024-03-10', []]])

    expect(buildBulkAssignments(state, MORNING, occupied)).toEqual([{ dateKey: '2024-03-11', shiftType: MORNING }])
    expect(buildBulkAssignments(state, null, NO_OCCUPIED_DAYS)).toEqual([])
  })

  it('非添加模式返回空列表', () => {
    expect(buildBulkAssignments(createCalendarSelectionState(TODAY), MORNING, NO_OCCUPIED_DAYS)).toEqual([])
  })
})

describe('筛选条件', () => {
  it('应逐项合并并可一次清空', () => {
    const state = reduce([
      { type: 'filter-changed', filter: { shiftTypeId: 'shift-type-night' } },
      { type: 'filter-changed', filter: { locationId: 'location-demo-ward' } },
    ])
    expect(state.filter).toEqual({ shiftTypeId: 'shift-type-night', locationId: 'location-demo-ward' })

    const cleared = calendarSelectionReducer(state, { type: 'filters-cleared' })
    expect(cleared.filter).toEqual({ shiftTypeId: null, locationId: null })
  })
})

describe('useCalendarSelection', () => {
  it('应把单元格交互转成对应动作', () => {
    const { result } = renderHook(() => useCalendarSelection(TODAY))

    act(() => {
      result.current.handleInteraction({ type: 'select-date', dateKey: '2024-03-20' })
    })
    expect(result.current.state.focusedDateKey).toBe('2024-03-20')

    act(() => {
      result.current.dispatch({ type: 'selection-mode-entered', mode: 'add' })
    })
    act(() => {
      result.current.handleInteraction({ type: 'toggle-date-selection', dateKey: '2024-03-21' })
    })

    expect(result.current.selection.mode).toBe('add')
    expect(result.current.selection.selectedDates.has('2024-03-21')).toBe(true)
    expect(result.current.state.focusedDateKey).toBe('2024-03-20')
  })
})
