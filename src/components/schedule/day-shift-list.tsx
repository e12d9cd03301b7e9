import { useState } from 'react'
import type { ScheduledShift, SelectionMode, ShiftType } from '../../types/shift'
import { formatTimeRange, MISSING_SHIFT_SYMBOL } from '../../utils/shift-aggregation'

interface DayShiftListProps {
  dateKey: string
  shifts: readonly ScheduledShift[]
  shiftTypes: readonly ShiftType[]
  mode: SelectionMode | null
  selectedShiftIds: ReadonlySet<string>
  isBusy?: boolean
  emptyLabel?: string
  onToggleShift: (shiftId: string) => void
  onStartDeleteSelection: (shiftId: string) => void
  onDeleteShift: (shiftId: string) => void
  onSwitchShift: (shiftId: string, shiftType: ShiftType) => void
}

export default function DayShiftList({
  dateKey,
  shifts,
  shiftTypes,
  mode,
  selectedShiftIds,
  isBusy = false,
  emptyLabel,
  onToggleShift,
  onStartDeleteSelection,
  onDeleteShift,
  onSwitchShift,
}: DayShiftListProps) {
  const [confirmingDeleteId, setConfirmingDeleteId] = useState<string | null>(null)

  if (shifts.length === 0) {
    return (
      <p className="sc-day-shifts__empty" data-testid="day-shifts-empty">
        {emptyLabel ?? `${dateKey} 暂无班次`}
      </p>
    )
  }

  return (
    <ul className="sc-day-shifts" aria-label={`${dateKey} 的班次`}>
      {shifts.map((shift) => {
        const shiftType = shift.shiftType
        const title = shiftType?.title ?? '未知班次'
        const isChecked = selectedShiftIds.has(shift.id)
        const switchTargets = shiftTypes.filter((item) => item.id !== shiftType?.id)

        return (
          <li key={shift.id} className={`sc-shift-card ${isChecked ? 'is-checked' : ''}`}>
            <span className="sc-shift-card__symbol" aria-hidden="true">
              {shiftType?.symbol ?? MISSING_SHIFT_SYMBOL}
            </span>
            <div className="sc-shift-card__body">
              <strong>{title}</strong>
              {shiftType ? <span className="sc-shift-card__time">{formatTimeRange(shiftType.duration)}</span> : null}
              {shiftType?.location ? <span className="sc-shift-card__location">{shiftType.location.name}</span> : null}
              {shift.notes ? <p className="sc-shift-card__notes">{shift.notes}</p> : null}
            </div>
            {mode === 'delete' ? (
              <input
                type="checkbox"
                aria-label={`选择 ${title}`}
                checked={isChecked}
                onChange={() => onToggleShift(shift.id)}
              />
            ) : null}
            {mode === null ? (
              <div className="sc-shift-card__actions">
                <select
                  aria-label={`调换 ${title}`}
                  value=""
                  disabled={isBusy || switchTargets.length === 0}
                  onChange={(event) => {
                    const target = switchTargets.find((item) => item.id === event.target.value)
                    if (target) {
                      onSwitchShift(shift.id, target)
                    }
                  }}
                >
                  <option value="">调换为…</option>
                  {switchTargets.map((item) => (
                    <option key={item.id} value={item.id}>
                      {item.symbol} {item.title}
                    </option>
                  ))}
                </select>
                {confirmingDeleteId === shift.id ? (
                  <>
                    <button
                      type="button"
                      aria-label={`确认删除 ${title}`}
                      disabled={isBusy}
                      onClick={() => {
                        setConfirmingDeleteId(null)
                        onDeleteShift(shift.id)
                      }}
                    >
                      确认删除
                    </button>
                    <button type="button" aria-label={`取消删除 ${title}`} onClick={() => setConfirmingDeleteId(null)}>
                      取消
                    </button>
                  </>
                ) : (
                  <button
                    type="button"
                    aria-label={`删除 ${title}`}
                    disabled={isBusy}
                    onClick={() => setConfirmingDeleteId(shift.id)}
                  >
                    删除
                  </button>
                )}
                <button type="button" aria-label={`多选删除 ${title}`} onClick={() => onStartDeleteSelection(shift.id)}>
                  多选
                </button>
              </div>
            ) : null}
          </li>
        )
      })}
    </ul>
  )
}
