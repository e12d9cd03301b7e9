import { describe, expect, it } from 'vitest'
import type { ScheduledShift, ShiftRecord, ShiftType } from '../../types/shift'
import {
  aggregateByDay,
  formatDisplaySymbol,
  formatTimeRange,
  groupShiftsByDay,
  MISSING_SHIFT_SYMBOL,
  toShiftRecord,
} from '../../utils/shift-aggregation'

const MORNING: ShiftType = {
  id: 'type-morning',
  symbol: '🌅',
  title: '早班',
  description: '',
  duration: { type: 'scheduled', from: { hour: 7, minute: 0 }, to: { hour: 15, minute: 30 } },
  location: null,
}

const ALL_DAY: ShiftType = {
  id: 'type-all-day',
  symbol: '🗓️',
  title: '培训',
  description: '',
  duration: { type: 'all-day' },
  location: null,
}

function record(date: Date, shiftTypeSymbol: string, isAllDay = false): ShiftRecord {
  return { date, shiftTypeSymbol, isAllDay }
}

describe('aggregateByDay', () => {
  it('空输入应返回空 Map', () => {
    expect(aggregateByDay([]).size).toBe(0)
  })

  it('同一天的计时班次与全天班次：全天标记优先', () => {
    const aggregates = aggregateByDay([
      record(new Date(2024, 2, 10, 7, 0), '🌅'),
      record(new Date(2024, 2, 10), '🗓️', true),
    ])

    const day = aggregates.get('2024-03-10')
    expect(aggregates.size).toBe(1)
    expect(day?.hasShift).toBe(true)
    expect(day?.isAllDayShift).toBe(true)
    expect(day?.date.getTime()).toBe(new Date(2024, 2, 10).getTime())
  })

  it('代表符号取时间最早的班次', () => {
    const aggregates = aggregateByDay([
      record(new Date(2024, 2, 10, 22, 0), '🌃'),
      record(new Date(2024, 2, 10, 7, 0), '🌅'),
    ])

    expect(aggregates.get('2024-03-10')?.displaySymbol).toBe('🌅')
  })

  it('时间相同时保留输入顺序中的第一个', () => {
    const at = new Date(2024, 2, 10, 9, 0)

    expect(aggregateByDay([record(at, 'A'), record(at, 'B')]).get('2024-03-10')?.displaySymbol).toBe('A')
    expect(aggregateByDay([record(at, 'B'), record(at, 'A')]).get('2024-03-10')?.displaySymbol).toBe('B')
  })

  it('输入重新排序后各日的 hasShift 与 isAllDayShift 不变', () => {
    const shifts = [
      record(new Date(2024, 2, 1, 7), 'M'),
      record(new Date(2024, 2, 1, 22), 'N'),
      record(new Date(2024, 2, 2), 'T', true),
      record(new Date(2024, 2, 3, 7), 'M'),
      record(new Date(2024, 2, 3, 12), 'T', true),
    ]
    const summarize = (input: ShiftRecord[]) =>
      [...aggregateByDay(input)]
        .map(([key, day]) => `${key}:${day.hasShift}:${day.isAllDayShift}:${day.displaySymbol}`)
        .sort()

    expect(summarize([...shifts].reverse())).toEqual(summarize(shifts))
    expect(summarize(shifts)).toEqual([
      '2024-03-01:true:false:M',
      '2024-03-02:true:true:T',
      '2024-03-03:true:true:M',
    ])
  })

  it('不应修改原始符号', () => {
    const shifts = [record(new Date(2024, 2, 5), 'LONGNAME')]

    expect(aggregateByDay(shifts).get('2024-03-05')?.displaySymbol).toBe('LONGNAME')
    expect(shifts[0].shiftTypeSymbol).toBe('LONGNAME')
  })
})

describe('formatDisplaySymbol', () => {
  it('超过 3 个字符应截断并追加省略号', () => {
    expect(formatDisplaySymbol('ABCDE')).toBe('ABC…')
  })

  it('不超过 3 个字符时保持不变', () => {
    expect(formatDisplaySymbol('AB')).toBe('AB')
    expect(formatDisplaySymbol('ABC')).toBe('ABC')
  })

  it('emoji 按单个字符计算', () => {
    expect(formatDisplaySymbol('🗓️')).toBe('🗓️')
    expect(formatDisplaySymbol('🌅🌃🏢🗓️')).toBe('🌅🌃🏢…')
  })
})

describe('toShiftRecord', () => {
  it('应展开班次类型的符号与全天标记', () => {
    const shift: ScheduledShift = {
      id: 's1',
      eventIdentifier: 'event:s1',
      shiftType: ALL_DAY,
      date: new Date(2024, 2, 10),
      notes: null,
    }

    expect(toShiftRecord(shift)).toEqual({ date: shift.date, shiftTypeSymbol: '🗓️', isAllDay: true })
  })

  it('缺少班次类型时使用占位符号', () => {
    const shift: ScheduledShift = {
      id: 's2',
      eventIdentifier: 'event:s2',
      shiftType: null,
      date: new Date(2024, 2, 11),
      notes: null,
    }

    expect(toShiftRecord(shift)).toEqual({ date: shift.date, shiftTypeSymbol: MISSING_SHIFT_SYMBOL, isAllDay: false })
  })
})

describe('formatTimeRange', () => {
  it('应区分全天与定时班次', () => {
    expect(formatTimeRange(ALL_DAY.duration)).toBe('全天')
    expect(formatTimeRange(MORNING.duration)).toBe('07:00 - 15:30')
  })
})

describe('groupShiftsByDay', () => {
  it('应按日期分组并保留顺序', () => {
    const shifts: ScheduledShift[] = [
      { id: 'a', eventIdentifier: 'event:a', shiftType: MORNING, date: new Date(2024, 2, 10, 7), notes: null },
      { id: 'b', eventIdentifier: 'event:b', shiftType: ALL_DAY, date: new Date(2024, 2, 11), notes: null },
      { id: 'c', eventIdentifier: 'event:c', shiftType: ALL_DAY, date: new Date(2024, 2, 10), notes: null },
    ]

    const grouped = groupShiftsByDay(shifts)

    expect(grouped.get('2024-03-10')?.map((shift) => shift.id)).toEqual(['a', 'c'])
    expect(grouped.get('2024-03-11')?.map((shift) => shift.id)).toEqual(['b'])
  })
})
