import { useState, type FormEvent } from 'react'
import type { ShiftType } from '../../types/shift'

interface AddShiftFormProps {
  dateKey: string
  shiftTypes: readonly ShiftType[]
  isSubmitting?: boolean
  onSubmit: (shiftType: ShiftType, notes: string) => void
}

export default function AddShiftForm({ dateKey, shiftTypes, isSubmitting = false, onSubmit }: AddShiftFormProps) {
  const [shiftTypeId, setShiftTypeId] = useState(() => shiftTypes[0]?.id ?? '')
  const [notes, setNotes] = useState('')
  const shiftType = shiftTypes.find((item) => item.id === shiftTypeId)

  const handleSubmit = (event: FormEvent<HTMLFormElement>) => {
    event.preventDefault()
    if (!shiftType) {
      return
    }
    onSubmit(shiftType, notes)
    setNotes('')
  }

  return (
    <form className="sc-add-shift" aria-label={`为 ${dateKey} 添加班次`} onSubmit={handleSubmit}>
      <select aria-label="新班次类型" value={shiftTypeId} onChange={(event) => setShiftTypeId(event.target.value)}>
        {shiftTypes.map((item) => (
          <option key={item.id} value={item.id}>
            {item.symbol} {item.title}
          </option>
        ))}
      </select>
      <input
        type="text"
        aria-label="备注"
        placeholder="备注（可选）"
        value={notes}
        onChange={(event) => setNotes(event.target.value)}
      />
      <button type="submit" disabled={!shiftType || isSubmitting}>
        添加班次
      </button>
    </form>
  )
}
