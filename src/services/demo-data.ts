import type { Location, ScheduledShift, ShiftType } from '../types/shift'
import { daysInMonth } from '../utils/date'

const DEMO_LOCATION: Location = {
  id: 'location-demo-ward',
  name: '住院部三楼',
  address: '演示路 1 号',
}

export const DEMO_SHIFT_TYPES: ShiftType[] = [
  {
    id: 'shift-type-morning',
    symbol: '🌅',
    title: '早班',
    description: '07:00 接班',
    duration: { type: 'scheduled', from: { hour: 7, minute: 0 }, to: { hour: 15, minute: 0 } },
    location: DEMO_LOCATION,
  },
  {
    id: 'shift-type-night',
    symbol: '🌃',
    title: '夜班',
    description: '夜间值守',
    duration: { type: 'scheduled', from: { hour: 22, minute: 0 }, to: { hour: 6, minute: 0 } },
    location: DEMO_LOCATION,
  },
  {
    id: 'shift-type-training',
    symbol: '🗓️',
    title: '全天培训',
    description: '院内培训日',
    duration: { type: 'all-day' },
    location: null,
  },
]

// Day-of-month pattern repeated for every demo month: [day, shift type index].
const DEMO_PATTERN: Array<[number, number]> = [
  [2, 0],
  [3, 0],
  [4, 1],
  [5, 1],
  [9, 0],
  [10, 2],
  [16, 0],
  [17, 1],
  [23, 2],
  [24, 0],
]

function buildDemoShift(year: number, monthIndex: number, day: number, shiftType: ShiftType): ScheduledShift {
  const start = shiftType.duration.type === 'scheduled' ? shiftType.duration.from : { hour: 0, minute: 0 }
  const date = new Date(year, monthIndex, day, start.hour, start.minute)
  const id = `demo-${year}-${monthIndex + 1}-${day}-${shiftType.id}`
  return {
    id,
    eventIdentifier: `event:${id}`,
    shiftType,
    date,
    notes: null,
  }
}

export function buildDemoShiftsForMonth(month: Date): ScheduledShift[] {
  const year = month.getFullYear()
  const monthIndex = month.getMonth()
  const lastDay = daysInMonth(year, monthIndex)

  return DEMO_PATTERN.filter(([day]) => day <= lastDay).map(([day, typeIndex]) =>
    buildDemoShift(year, monthIndex, day, DEMO_SHIFT_TYPES[typeIndex]),
  )
}

export function buildDemoShifts(anchor: Date, monthRadius = 1): ScheduledShift[] {
  const shifts: ScheduledShift[] = []
  for (let offset = -monthRadius; offset <= monthRadius; offset += 1) {
    shifts.push(...buildDemoShiftsForMonth(new Date(anchor.getFullYear(), anchor.getMonth() + offset, 1)))
  }
  return shifts
}
