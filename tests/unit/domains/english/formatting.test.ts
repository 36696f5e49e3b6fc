import { describe, expect, it } from 'vitest'
import {
  gelPercentage,
  plateName,
  temperature,
  unique,
  unit,
  wellList,
  wellName,
} from '../../../../src/domains/english/formatting.ts'

describe('unit', () => {
  it('pluralises known units above one', () => {
    expect(unit('2:microliter')).toBe('2 microliters')
    expect(unit('30:minute')).toBe('30 minutes')
    expect(unit('1.5:g')).toBe('1.5 gs')
  })

  it('keeps singular values and unknown units as given', () => {
    expect(unit('1:microliter')).toBe('1 microliter')
    expect(unit('0.5:hour')).toBe('0.5 hour')
    expect(unit('600:nanometer')).toBe('600 nanometers')
    expect(unit('1000:rpm')).toBe('1000 rpm')
  })
})

describe('wells and plates', () => {
  it('splits container and well references', () => {
    expect(plateName('plate_1/A1')).toBe('plate_1')
    expect(wellName('plate_1/A1')).toBe('A1')
    expect(wellName('A1')).toBe('A1')
  })

  it('lists up to the limit and counts beyond it', () => {
    expect(wellList(['A1', 'A2'])).toBe('wells A1, A2')
    expect(wellList([0, 1, 2], 2)).toBe('3 wells')
    expect(wellList(['A1', 'A2'], 2)).toBe('wells A1, A2')
  })
})

describe('helpers', () => {
  it('describes storage temperatures', () => {
    expect(temperature('warm_37')).toBe('37 degrees celsius')
    expect(temperature('ambient')).toBe('room temperature')
  })

  it('reads the agarose percentage from a gel matrix', () => {
    expect(gelPercentage('agarose(96,2.0%)')).toBe('2.0%')
    expect(gelPercentage('custom')).toBe('custom')
  })

  it('keeps the first occurrence order', () => {
    expect(unique(['b', 'a', 'b', 'c', 'a'])).toEqual(['b', 'a', 'c'])
  })
})
