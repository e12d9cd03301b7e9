import { useMemo, useState } from 'react'
import type { CellEdge, CellInteraction, EdgeSet, MonthViewCell } from '../../types/calendar'
import type { DayKey, SelectionState, ShiftRecord } from '../../types/shift'
import { formatDateKey } from '../../utils/date'
import { buildMonthView } from './cell-presentation'
import { getWeekdayLabels } from './month-calendar-utils'

const EDGE_ORDER: CellEdge[] = ['top', 'bottom', 'leading', 'trailing']
const MONTH_BUTTONS = Array.from({ length: 12 }, (_, index) => index)

const MIN_YEAR = 1970
const MAX_YEAR = 9999

function serializeEdges(edges: EdgeSet): string {
  return EDGE_ORDER.filter((edge) => edges.has(edge)).join(' ')
}

function edgeClassNames(edges: EdgeSet): string[] {
  return EDGE_ORDER.filter((edge) => edges.has(edge)).map((edge) => `sc-cal__cell--edge-${edge}`)
}

export interface MonthCalendarProps {
  month: Date
  shifts: readonly ShiftRecord[]
  selection: SelectionState
  focusedDateKey: DayKey
  firstWeekday: number
  locale?: string
  todayDateKey?: DayKey
  onCellInteraction: (interaction: CellInteraction) => void
  onPreviousMonth: () => void
  onNextMonth: () => void
  onPickMonth: (year: number, monthIndex: number) => void
}

function CalendarGridCell({
  cell,
  onCellInteraction,
}: {
  cell: MonthViewCell
  onCellInteraction: (interaction: CellInteraction) => void
}) {
  const { presentation, edges } = cell
  const edgeClasses = edgeClassNames(edges)

  if (presentation.kind === 'blank') {
    return <div className="sc-cal__cell sc-cal__cell--blank" data-cell-index={presentation.index} aria-hidden="true" />
  }

  if (presentation.kind === 'selectable-empty-target') {
    const className = [
      'sc-cal__cell',
      'sc-cal__cell--target',
      presentation.isSelected ? 'is-checked' : '',
      presentation.isToday ? 'is-today' : '',
      ...edgeClasses,
    ]
      .filter(Boolean)
      .join(' ')

    return (
      <button
        type="button"
        className={className}
        onClick={() => onCellInteraction(presentation.interaction)}
        aria-label={`勾选 ${presentation.dateKey}`}
        aria-pressed={presentation.isSelected}
        data-cell-index={presentation.index}
        data-edges={serializeEdges(edges)}
      >
        <span className="sc-cal__day">{presentation.day}</span>
        {presentation.isSelected ? <span className="sc-cal__check">✓</span> : null}
      </button>
    )
  }

  const className = [
    'sc-cal__cell',
    presentation.hasShift ? 'has-shift' : '',
    presentation.isAllDayShift ? 'is-all-day' : '',
    presentation.isToday ? 'is-today' : '',
    presentation.isSelectedDate ? 'is-selected' : '',
    ...edgeClasses,
  ]
    .filter(Boolean)
    .join(' ')

  return (
    <button
      type="button"
      className={className}
      onClick={() => onCellInteraction(presentation.interaction)}
      aria-label={`选择 ${presentation.dateKey}`}
      aria-current={presentation.isToday ? 'date' : undefined}
      aria-pressed={presentation.isSelectedDate}
      data-cell-index={presentation.index}
      data-edges={serializeEdges(edges)}
      data-has-shift={presentation.hasShift ? 'true' : 'false'}
    >
      {presentation.displaySymbol ? <span className="sc-cal__symbol">{presentation.displaySymbol}</span> : null}
      <span className="sc-cal__day">{presentation.day}</span>
    </button>
  )
}

export function MonthCalendar({
  month,
  shifts,
  selection,
  focusedDateKey,
  firstWeekday,
  locale = 'zh-CN',
  todayDateKey,
  onCellInteraction,
  onPreviousMonth,
  onNextMonth,
  onPickMonth,
}: MonthCalendarProps) {
  const monthTitle = useMemo(
    () => new Intl.DateTimeFormat(locale, { year: 'numeric', month: 'long' }).format(month),
    [locale, month],
  )
  const weekdayLabels = useMemo(() => getWeekdayLabels(firstWeekday), [firstWeekday])
  const todayKey = todayDateKey ?? formatDateKey(new Date())
  const cells = useMemo(
    () => buildMonthView(month, shifts, selection, { firstWeekday, focusedDateKey, todayDateKey: todayKey }),
    [firstWeekday, focusedDateKey, month, selection, shifts, todayKey],
  )

  const [isPickerOpen, setIsPickerOpen] = useState(false)
  const [draftYear, setDraftYear] = useState(month.getFullYear())
  const [draftMonth, setDraftMonth] = useState(month.getMonth())

  const openPicker = () => {
    setDraftYear(month.getFullYear())
    setDraftMonth(month.getMonth())
    setIsPickerOpen(true)
  }

  const applyPickerSelection = () => {
    onPickMonth(draftYear, draftMonth)
    setIsPickerOpen(false)
  }

  return (
    <section className="sc-cal" aria-label="排班日历">
      <header className="sc-cal__header">
        <button type="button" className="sc-cal__nav" onClick={onPreviousMonth} aria-label="上个月">
          ◀
        </button>
        <button
          type="button"
          className="sc-cal__title"
          aria-label="选择年月"
          onClick={() => (isPickerOpen ? setIsPickerOpen(false) : openPicker())}
        >
          {monthTitle}
        </button>
        <button type="button" className="sc-cal__nav" onClick={onNextMonth} aria-label="下个月">
          ▶
        </button>

        {isPickerOpen ? (
          <div className="sc-cal__picker" role="dialog" aria-label="年月选择">
            <div className="sc-cal__picker-year">
              <button
                type="button"
                aria-label="年份减一"
                disabled={draftYear <= MIN_YEAR}
                onClick={() => setDraftYear((year) => year - 1)}
              >
                &#8249;
              </button>
              <span aria-label="年份">{draftYear}</span>
              <button
                type="button"
                aria-label="年份加一"
                disabled={draftYear >= MAX_YEAR}
                onClick={() => setDraftYear((year) => year + 1)}
              >
                &#8250;
              </button>
            </div>
            <div className="sc-cal__picker-months">
              {MONTH_BUTTONS.map((monthIndex) => (
                <button
                  key={monthIndex}
                  type="button"
                  aria-pressed={monthIndex === draftMonth}
                  onClick={() => setDraftMonth(monthIndex)}
                >
                  {monthIndex + 1}月
                </button>
              ))}
            </div>
            <div className="sc-cal__picker-actions">
              <button type="button" onClick={() => setIsPickerOpen(false)}>
                取消
              </button>
              <button type="button" onClick={applyPickerSelection}>
                确定
              </button>
            </div>
          </div>
        ) : null}
      </header>

      <div className="sc-cal__weekdays" aria-hidden="true">
        {weekdayLabels.map((label) => (
          <span key={label} className="sc-cal__weekday">
            周{label}
          </span>
        ))}
      </div>

      <div className="sc-cal__grid" role="grid" aria-label="月份日期">
        {cells.map((cell) => (
          <CalendarGridCell key={cell.presentation.index} cell={cell} onCellInteraction={onCellInteraction} />
        ))}
      </div>
    </section>
  )
}

export default MonthCalendar
