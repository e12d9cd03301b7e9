import type { BulkAddMode, DayKey, ShiftType } from '../../types/shift'

interface BulkAddPanelProps {
  bulkAddMode: BulkAddMode
  shiftTypes: readonly ShiftType[]
  sharedShiftTypeId: string
  selectedDates: ReadonlySet<DayKey>
  assignments: ReadonlyMap<DayKey, ShiftType>
  onModeChange: (bulkAddMode: BulkAddMode) => void
  onSharedShiftTypeChange: (shiftTypeId: string) => void
  onAssign: (dateKey: DayKey, shiftType: ShiftType) => void
  onRemoveAssignment: (dateKey: DayKey) => void
}

const MODE_LABEL: Record<BulkAddMode, string> = {
  'same-shift': '统一班次',
  'per-date': '逐日指定',
}

const MODES: BulkAddMode[] = ['same-shift', 'per-date']

export default function BulkAddPanel({
  bulkAddMode,
  shiftTypes,
  sharedShiftTypeId,
  selectedDates,
  assignments,
  onModeChange,
  onSharedShiftTypeChange,
  onAssign,
  onRemoveAssignment,
}: BulkAddPanelProps) {
  const sortedDates = [...selectedDates].sort()

  return (
    <section className="sc-bulk-add" aria-label="批量添加设置">
      <div className="sc-bulk-add__modes" role="group" aria-label="批量添加方式">
        {MODES.map((mode) => (
          <button key={mode} type="button" aria-pressed={bulkAddMode === mode} onClick={() => onModeChange(mode)}>
            {MODE_LABEL[mode]}
          </button>
        ))}
      </div>

      {bulkAddMode === 'same-shift' ? (
        <label className="sc-bulk-add__type">
          <span>班次类型</span>
          <select value={sharedShiftTypeId} onChange={(event) => onSharedShiftTypeChange(event.target.value)}>
            {shiftTypes.map((shiftType) => (
              <option key={shiftType.id} value={shiftType.id}>
                {shiftType.symbol} {shiftType.title}
              </option>
            ))}
          </select>
        </label>
      ) : (
        <div className="sc-bulk-add__per-date">
          {sortedDates.length === 0 ? <p className="sc-bulk-add__empty">尚未选择日期</p> : null}
          {sortedDates.map((dateKey) => (
            <label key={dateKey} className="sc-bulk-add__row">
              <span>{dateKey}</span>
              <select
                aria-label={`${dateKey} 的班次类型`}
                value={assignments.get(dateKey)?.id ?? ''}
                onChange={(event) => {
                  const shiftType = shiftTypes.find((item) => item.id === event.target.value)
                  if (shiftType) {
                    onAssign(dateKey, shiftType)
                  } else {
                    onRemoveAssignment(dateKey)
                  }
                }}
              >
                <option value="">未指定</option>
                {shiftTypes.map((shiftType) => (
                  <option key={shiftType.id} value={shiftType.id}>
                    {shiftType.symbol} {shiftType.title}
                  </option>
                ))}
              </select>
            </label>
          ))}
          <p className="sc-bulk-add__progress" data-testid="per-date-progress">
            已指定 {assignments.size} / {sortedDates.length}
          </p>
        </div>
      )}
    </section>
  )
}
