import { useEffect, useMemo, useState } from 'react'
import { useMutation, useQuery, useQueryClient } from '@tanstack/react-query'
import MonthCalendar from '../components/calendar/month-calendar'
import SelectionToolbar from '../components/common/selection-toolbar'
import StatusHint from '../components/common/status-hint'
import AddShiftForm from '../components/schedule/add-shift-form'
import BulkAddPanel from '../components/schedule/bulk-add-panel'
import DayShiftList from '../components/schedule/day-shift-list'
import ShiftFilterBar from '../components/schedule/shift-filter-bar'
import { CALENDAR_CONFIG } from '../config/calendar'
import {
  buildBulkAssignments,
  canAddToSelectedDates,
  canDeleteSelectedShifts,
  selectionCount,
  useCalendarSelection,
} from '../hooks/use-calendar-selection'
import { useToast } from '../hooks/use-toast'
import type { ShiftSource } from '../services/shift-source'
import type { SelectionState, ShiftAssignment, ShiftType } from '../types/shift'
import { endOfMonth, formatDateKey, formatMonthKey } from '../utils/date'
import { getErrorMessage } from '../utils/errors'
import { groupShiftsByDay, toShiftRecord } from '../utils/shift-aggregation'
import { filterShifts, hasActiveFilter } from '../utils/shift-filter'

export interface SchedulePageProps {
  shiftSource: ShiftSource
  shiftTypes: readonly ShiftType[]
  firstWeekday?: number
  locale?: string
  today?: Date
}

type ChangeScope = 'bulk' | 'single'

type ShiftChange =
  | { type: 'add'; scope: ChangeScope; assignments: ShiftAssignment[] }
  | { type: 'delete'; scope: ChangeScope; shiftIds: string[] }
  | { type: 'switch'; scope: 'single'; shiftId: string; shiftType: ShiftType }

function describeChange(change: ShiftChange, count: number): string {
  switch (change.type) {
    case 'add':
      return `已添加 ${count} 个班次`
    case 'delete':
      return `已删除 ${count} 个班次`
    case 'switch':
      return `已调换为${change.shiftType.title}`
  }
}

export default function SchedulePage({
  shiftSource,
  shiftTypes,
  firstWeekday = CALENDAR_CONFIG.firstWeekday,
  locale = CALENDAR_CONFIG.locale,
  today,
}: SchedulePageProps) {
  const queryClient = useQueryClient()
  const { push } = useToast()
  const { state, selection, dispatch, handleInteraction } = useCalendarSelection(today)
  const [sharedShiftTypeId, setSharedShiftTypeId] = useState(() => shiftTypes[0]?.id ?? '')
  const todayKey = formatDateKey(today ?? new Date())
  const monthKey = formatMonthKey(state.displayedMonth)

  const shiftsQuery = useQuery({
    queryKey: ['shifts', monthKey],
    queryFn: () => shiftSource.listShiftsInRange(state.displayedMonth, endOfMonth(state.displayedMonth)),
  })

  const loadError = shiftsQuery.error ? getErrorMessage(shiftsQuery.error) : null

  useEffect(() => {
    if (!shiftsQuery.error) {
      return
    }
    console.error('加载班次失败', shiftsQuery.error)
    push({ kind: 'schedule', level: 'error', title: '加载班次失败', message: getErrorMessage(shiftsQuery.error) })
  }, [push, shiftsQuery.error])

  const changeMutation = useMutation({
    mutationFn: async (change: ShiftChange): Promise<number> => {
      switch (change.type) {
        case 'add': {
          const created = await shiftSource.addShifts(change.assignments)
          return created.length
        }
        case 'delete':
          return shiftSource.deleteShifts(change.shiftIds)
        case 'switch':
          await shiftSource.replaceShiftType(change.shiftId, change.shiftType)
          return 1
      }
    },
    onSuccess: async (count, change) => {
      if (change.scope === 'bulk') {
        dispatch({ type: 'selection-mode-exited' })
      }
      push({
        kind: change.scope === 'bulk' ? 'selection' : 'schedule',
        level: 'success',
        message: describeChange(change, count),
      })
      await queryClient.invalidateQueries({ queryKey: ['shifts'] })
    },
    onError: (error, change) => {
      const title = change.scope === 'bulk' ? '批量操作失败' : '班次操作失败'
      console.error(title, error)
      push({ kind: change.scope === 'bulk' ? 'selection' : 'schedule', level: 'error', title, message: getErrorMessage(error) })
    },
  })

  const shifts = useMemo(() => shiftsQuery.data ?? [], [shiftsQuery.data])
  const shiftRecords = useMemo(() => shifts.map(toShiftRecord), [shifts])
  const shiftsByDay = useMemo(() => groupShiftsByDay(shifts), [shifts])
  const dayShifts = shiftsByDay.get(state.focusedDateKey) ?? []
  const focusedShifts = filterShifts(dayShifts, state.filter)
  const isFilteredOut = hasActiveFilter(state.filter) && dayShifts.length > 0 && focusedShifts.length === 0

  // Until the displayed month has loaded, no day is known to be empty.
  const calendarSelection = useMemo<SelectionState>(
    () => (selection.mode === 'add' && !shiftsQuery.isSuccess ? { ...selection, mode: null } : selection),
    [selection, shiftsQuery.isSuccess],
  )

  const handleConfirm = () => {
    if (state.mode === 'add') {
      if (!canAddToSelectedDates(state)) {
        return
      }
      const sharedShiftType = shiftTypes.find((item) => item.id === sharedShiftTypeId) ?? null
      const assignments = buildBulkAssignments(state, sharedShiftType, shiftsByDay)
      if (assignments.length === 0) {
        push({ kind: 'selection', level: 'warning', message: '所选日期都已有班次' })
        return
      }
      changeMutation.mutate({ type: 'add', scope: 'bulk', assignments })
      return
    }
    if (state.mode === 'delete' && canDeleteSelectedShifts(state)) {
      changeMutation.mutate({ type: 'delete', scope: 'bulk', shiftIds: [...state.selectedShiftIds] })
    }
  }

  return (
    <article className="sc-schedule" aria-label="schedule-page">
      <header className="sc-schedule__header">
        <h2>排班日历</h2>
        <StatusHint isLoading={shiftsQuery.isLoading} error={loadError} />
        <button type="button" onClick={() => dispatch({ type: 'jumped-to-today', todayKey })}>
          今天
        </button>
        {state.mode === null ? (
          <button type="button" onClick={() => dispatch({ type: 'selection-mode-entered', mode: 'add' })}>
            批量添加
          </button>
        ) : null}
      </header>

      {state.mode !== null ? (
        <SelectionToolbar
          mode={state.mode}
          count={selectionCount(state)}
          canConfirm={state.mode === 'add' ? canAddToSelectedDates(state) : canDeleteSelectedShifts(state)}
          isSubmitting={changeMutation.isPending}
          onCancel={() => dispatch({ type: 'selection-mode-exited' })}
          onConfirm={handleConfirm}
        />
      ) : null}

      {state.mode === 'add' ? (
        <BulkAddPanel
          bulkAddMode={state.bulkAddMode}
          shiftTypes={shiftTypes}
          sharedShiftTypeId={sharedShiftTypeId}
          selectedDates={state.selectedDates}
          assignments={state.dateShiftAssignments}
          onModeChange={(bulkAddMode) => dispatch({ type: 'bulk-add-mode-changed', bulkAddMode })}
          onSharedShiftTypeChange={setSharedShiftTypeId}
          onAssign={(dateKey, shiftType) => dispatch({ type: 'shift-assigned-to-date', dateKey, shiftType })}
          onRemoveAssignment={(dateKey) => dispatch({ type: 'shift-assignment-removed', dateKey })}
        />
      ) : null}

      <MonthCalendar
        month={state.displayedMonth}
        shifts={shiftRecords}
        selection={calendarSelection}
        focusedDateKey={state.focusedDateKey}
        firstWeekday={firstWeekday}
        locale={locale}
        todayDateKey={todayKey}
        onCellInteraction={handleInteraction}
        onPreviousMonth={() => dispatch({ type: 'month-shifted', offset: -1 })}
        onNextMonth={() => dispatch({ type: 'month-shifted', offset: 1 })}
        onPickMonth={(year, monthIndex) => dispatch({ type: 'month-picked', year, monthIndex })}
      />

      <section className="sc-schedule__day" aria-label="当日班次">
        <h3>{state.focusedDateKey}</h3>
        <ShiftFilterBar
          filter={state.filter}
          shiftTypes={shiftTypes}
          onChange={(filter) => dispatch({ type: 'filter-changed', filter })}
          onClear={() => dispatch({ type: 'filters-cleared' })}
        />
        <DayShiftList
          dateKey={state.focusedDateKey}
          shifts={focusedShifts}
          shiftTypes={shiftTypes}
          mode={state.mode}
          selectedShiftIds={state.selectedShiftIds}
          isBusy={changeMutation.isPending}
          emptyLabel={isFilteredOut ? '没有符合筛选条件的班次' : undefined}
          onToggleShift={(shiftId) => dispatch({ type: 'shift-selection-toggled', shiftId })}
          onStartDeleteSelection={(shiftId) =>
            dispatch({ type: 'selection-mode-entered', mode: 'delete', firstId: shiftId })
          }
          onDeleteShift={(shiftId) => changeMutation.mutate({ type: 'delete', scope: 'single', shiftIds: [shiftId] })}
          onSwitchShift={(shiftId, shiftType) =>
            changeMutation.mutate({ type: 'switch', scope: 'single', shiftId, shiftType })
          }
        />
        {state.mode === null ? (
          <AddShiftForm
            dateKey={state.focusedDateKey}
            shiftTypes={shiftTypes}
            isSubmitting={changeMutation.isPending}
            onSubmit={(shiftType, notes) =>
              changeMutation.mutate({
                type: 'add',
                scope: 'single',
                assignments: [{ dateKey: state.focusedDateKey, shiftType, notes }],
              })
            }
          />
        ) : null}
      </section>
    </article>
  )
}
