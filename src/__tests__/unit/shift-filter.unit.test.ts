import { describe, expect, it } from 'vitest'
import { DEMO_SHIFT_TYPES } from '../../services/demo-data'
import type { ScheduledShift, ShiftType } from '../../types/shift'
import { collectLocations, EMPTY_SHIFT_FILTER, filterShifts, hasActiveFilter } from '../../utils/shift-filter'

const [MORNING, NIGHT, TRAINING] = DEMO_SHIFT_TYPES

function shift(id: string, shiftType: ShiftType | null): ScheduledShift {
  return { id, eventIdentifier: `event:${id}`, shiftType, date: new Date(2024, 2, 10), notes: null }
}

const SHIFTS = [shift('m', MORNING), shift('n', NIGHT), shift('t', TRAINING), shift('x', null)]

describe('filterShifts', () => {
  it('无筛选条件时原样返回', () => {
    expect(hasActiveFilter(EMPTY_SHIFT_FILTER)).toBe(false)
    expect(filterShifts(SHIFTS, EMPTY_SHIFT_FILTER).map((item) => item.id)).toEqual(['m', 'n', 't', 'x'])
  })

  it('按班次类型筛选', () => {
    const filter = { shiftTypeId: 'shift-type-night', locationId: null }

    expect(hasActiveFilter(filter)).toBe(true)
    expect(filterShifts(SHIFTS, filter).map((item) => item.id)).toEqual(['n'])
  })

  it('按地点筛选时排除无地点与缺失类型的班次', () => {
    const filter = { shiftTypeId: null, locationId: 'location-demo-ward' }

    expect(filterShifts(SHIFTS, filter).map((item) => item.id)).toEqual(['m', 'n'])
  })

  it('两个条件同时生效', () => {
    const filter = { shiftTypeId: 'shift-type-training', locationId: 'location-demo-ward' }

    expect(filterShifts(SHIFTS, filter)).toEqual([])
  })
})

describe('collectLocations', () => {
  it('按首次出现顺序去重并跳过无地点的类型', () => {
    expect(collectLocations(DEMO_SHIFT_TYPES).map((location) => location.name)).toEqual(['住院部三楼'])
  })
})
