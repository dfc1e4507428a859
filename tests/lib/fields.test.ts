import { describe, it, expect } from 'vitest'
import { CifpFieldError } from '@/lib/cifp/errors'
import {
  composeLine,
  field,
  readImpliedDecimal,
  readInteger,
  readMagneticVariation,
  readRaw,
  readString,
  sliceField,
  writeImpliedDecimal,
  writeInteger,
  writeMagneticVariation,
  writeString,
} from '@/lib/cifp/fields'
import { VHF_NAVAID_FIELDS } from '@/lib/cifp/vhf-navaid'
import { BRAVO_PRIMARY, DELTA_PRIMARY, setColumns } from '../helpers'

describe('reading fields', () => {
  it('slices by 1-based column', () => {
    expect(readRaw(BRAVO_PRIMARY, VHF_NAVAID_FIELDS.vhfId)).toBe('BVT ')
    expect(readString(BRAVO_PRIMARY, VHF_NAVAID_FIELDS.vhfId)).toBe('BVT')
    expect(readString(BRAVO_PRIMARY, VHF_NAVAID_FIELDS.vhfName)).toBe('BRAVO VALLEY')
  })

  it('treats a blank field as null', () => {
    expect(readString(BRAVO_PRIMARY, VHF_NAVAID_FIELDS.airportId)).toBeNull()
    expect(readInteger(BRAVO_PRIMARY, VHF_NAVAID_FIELDS.dmeBias)).toBeNull()
  })

  it('pads a field that runs past the end of a short line', () => {
    expect(sliceField('SUSAD', field('x', 4, 4))).toBe('AD  ')
    expect(readString('SUSAD', field('x', 10, 3))).toBeNull()
  })

  it('reads signed integers', () => {
    expect(readInteger(BRAVO_PRIMARY, VHF_NAVAID_FIELDS.dmeElevation)).toBe(5280)
    expect(readInteger(DELTA_PRIMARY, VHF_NAVAID_FIELDS.dmeElevation)).toBe(-12)
  })

  it('rejects a non-numeric integer field', () => {
    const line = setColumns(BRAVO_PRIMARY, 80, '0528X')
    expect(() => readInteger(line, VHF_NAVAID_FIELDS.dmeElevation)).toThrow(CifpFieldError)
    expect(() => readInteger(line, VHF_NAVAID_FIELDS.dmeElevation)).toThrowError(
      'Invalid dme_elevation "0528X": expected an integer'
    )
  })

  it('applies implied decimals', () => {
    expect(readImpliedDecimal(BRAVO_PRIMARY, VHF_NAVAID_FIELDS.frequency, 2)).toBe(113.7)
    expect(readImpliedDecimal(DELTA_PRIMARY, VHF_NAVAID_FIELDS.dmeBias, 1)).toBe(0.5)
  })

  it('reads magnetic variation with west negative', () => {
    expect(readMagneticVariation(BRAVO_PRIMARY, VHF_NAVAID_FIELDS.magVar)).toBe(9)
    expect(readMagneticVariation(DELTA_PRIMARY, VHF_NAVAID_FIELDS.magVar)).toBe(-12.3)
    expect(readMagneticVariation(setColumns(BRAVO_PRIMARY, 75, 'T0000'), VHF_NAVAID_FIELDS.magVar)).toBe(0)
  })

  it('rejects an unknown variation direction', () => {
    const line = setColumns(BRAVO_PRIMARY, 75, 'X0010')
    expect(() => readMagneticVariation(line, VHF_NAVAID_FIELDS.magVar)).toThrowError(
      'Invalid mag_var "X0010": expected E/W/T followed by four digits'
    )
  })
})

describe('writing fields', () => {
  const width3 = field('width3', 1, 3)
  const width5 = field('width5', 1, 5)

  it('zero-pads integers to the field width', () => {
    expect(writeInteger(7, width3)).toBe('007')
    expect(writeInteger(-12, width5)).toBe('-0012')
    expect(writeInteger(null, width3)).toBe('   ')
  })

  it('refuses values that do not fit', () => {
    expect(() => writeInteger(1234, width3)).toThrowError('Invalid width3 "1234": does not fit in 3 columns')
    expect(() => writeInteger(1.5, width3)).toThrowError('Invalid width3 "1.5": expected an integer')
    expect(() => writeString('TOO LONG', width3)).toThrow(CifpFieldError)
  })

  it('writes implied decimals and variation', () => {
    expect(writeImpliedDecimal(113.7, width5, 2)).toBe('11370')
    expect(writeMagneticVariation(-12.3, width5)).toBe('W0123')
    expect(writeMagneticVariation(0, width5)).toBe('E0000')
  })

  it('keeps west on a zero variation', () => {
    const westZero = readMagneticVariation(setColumns(BRAVO_PRIMARY, 75, 'W0000'), VHF_NAVAID_FIELDS.magVar)
    expect(westZero).toBe(-0)
    expect(writeMagneticVariation(westZero, width5)).toBe('W0000')
  })

  it('left-aligns strings', () => {
    expect(writeString('AB', width5)).toBe('AB   ')
  })
})

describe('composeLine', () => {
  it('lays fields onto a blank 132 column line', () => {
    const line = composeLine([
      [field('a', 1, 2), 'AB'],
      [field('b', 131, 2), 'YZ'],
    ])
    expect(line).toBe(`AB${' '.repeat(128)}YZ`)
  })

  it('rejects an encoded value of the wrong width', () => {
    expect(() => composeLine([[field('a', 1, 3), 'AB']])).toThrowError(
      'Invalid a "AB": encoded to 2 columns instead of 3'
    )
  })
})
