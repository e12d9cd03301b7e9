import type { ShiftFilter, ShiftType } from '../../types/shift'
import { collectLocations, hasActiveFilter } from '../../utils/shift-filter'

interface ShiftFilterBarProps {
  filter: ShiftFilter
  shiftTypes: readonly ShiftType[]
  onChange: (filter: Partial<ShiftFilter>) => void
  onClear: () => void
}

export default function ShiftFilterBar({ filter, shiftTypes, onChange, onClear }: ShiftFilterBarProps) {
  const locations = collectLocations(shiftTypes)

  return (
    <div className="sc-filter-bar" role="group" aria-label="班次筛选">
      <select
        aria-label="按班次类型筛选"
        value={filter.shiftTypeId ?? ''}
        onChange={(event) => onChange({ shiftTypeId: event.target.value || null })}
      >
        <option value="">全部班次</option>
        {shiftTypes.map((shiftType) => (
          <option key={shiftType.id} value={shiftType.id}>
            {shiftType.symbol} {shiftType.title}
          </option>
        ))}
      </select>
      <select
        aria-label="按地点筛选"
        value={filter.locationId ?? ''}
        onChange={(event) => onChange({ locationId: event.target.value || null })}
      >
        <option value="">全部地点</option>
        {locations.map((location) => (
          <option key={location.id} value={location.id}>
            {location.name}
          </option>
        ))}
      </select>
      {hasActiveFilter(filter) ? (
        <button type="button" onClick={onClear}>
          清除筛选
        </button>
      ) : null}
    </div>
  )
}
