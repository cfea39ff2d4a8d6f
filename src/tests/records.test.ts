/**
 * Upstream record validation and normalization tests.
 */

import { describe, it, expect } from 'vitest'
import {
  FlowRowSI, FlowHeaderSI, FlowHeaderUS, MainInputsUS, splitRecord,
  normalizeFlowRowSI, normalizeFlowRowUS, normalizeFlowHeaderSI, parseFlowTest,
  adoptLegacyUSRow, adoptLegacyUSHeader,
} from '../flow/records.ts'
import { InvalidArgumentError } from '../flow/errors.ts'
import { cfmToM3s, inH2OToPa } from '../flow/units.ts'

const HEADER_SI = {
  d_valve_in_mm: 44,
  d_valve_ex_mm: 36,
  d_throat_in_mm: 38,
  d_stem_in_mm: 6,
  in_width_mm: 40,
  in_height_mm: 30,
  in_r_top_mm: 5,
  cr: 10.5,
  max_lift_mm: 12,
}

describe('splitRecord', () => {
  it('applies defaults and passes unknown fields through', () => {
    const { record, extras } = splitRecord(FlowRowSI, {
      lift_mm: 5,
      q_in_m3min: 1.2,
      bench_id: 'B2',
      n_int_valves_per_cyl: 2,
    })
    expect(record.q_ex_m3min).toBe(0)
    expect(record.dp_inH2O).toBe(28)
    expect(extras).toEqual({ bench_id: 'B2', n_int_valves_per_cyl: 2 })
  })

  it('names the failing field', () => {
    let caught: unknown
    try {
      splitRecord(FlowRowSI, { lift_mm: -1, q_in_m3min: 1 }, 'loadRow')
    } catch (err) {
      caught = err
    }
    expect(caught).toBeInstanceOf(InvalidArgumentError)
    if (caught instanceof InvalidArgumentError) {
      expect(caught.operation).toBe('loadRow')
      expect(caught.field).toBe('lift_mm')
      expect(caught.message.startsWith('loadRow: lift_mm:')).toBe(true)
    }
  })

  it('rejects a missing required field', () => {
    expect(() => splitRecord(MainInputsUS, { mach: 0.5, n_cyl: 8, bore_in: 4, stroke_in: 4 })).toThrow(/mean_port_area_in2/)
  })

  it('rejects a non-object', () => {
    expect(() => splitRecord(FlowRowSI, 42)).toThrow(InvalidArgumentError)
  })

  it('main inputs default VE, CR and siamesed flag', () => {
    const { record } = splitRecord(MainInputsUS, { mach: 0.5, n_cyl: 8, bore_in: 4, stroke_in: 4, mean_port_area_in2: 2.5 })
    expect(record.ve).toBe(1)
    expect(record.cr).toBe(10.5)
    expect(record.siamesed_intake).toBe(false)
  })

  it('main inputs reject Mach above 1', () => {
    expect(() => splitRecord(MainInputsUS, { mach: 1.2, n_cyl: 8, bore_in: 4, stroke_in: 4, mean_port_area_in2: 2.5 })).toThrow(InvalidArgumentError)
  })
})

describe('normalize', () => {
  it('SI row to base units', () => {
    const { record } = splitRecord(FlowRowSI, { lift_mm: 5, q_in_m3min: 1.2, q_ex_m3min: 0.9, a_mean_mm2: 1500 })
    const row = normalizeFlowRowSI(record)
    expect(row.lift).toBeCloseTo(0.005, 15)
    expect(row.intakeFlow).toBeCloseTo(0.02, 15)
    expect(row.exhaustFlow).toBeCloseTo(0.015, 15)
    expect(row.depression_Pa).toBeCloseTo(inH2OToPa(28), 10)
    expect(row.meanArea).toBeCloseTo(0.0015, 15)
    expect(row.airState).toBeUndefined()
  })

  it('US row to base units', () => {
    const row = normalizeFlowRowUS({ lift_in: 0.5, q_in_cfm: 250, q_ex_cfm: 0, dp_inH2O: 10 })
    expect(row.lift).toBeCloseTo(0.0127, 12)
    expect(row.intakeFlow).toBeCloseTo(cfmToM3s(250), 12)
    expect(row.depression_Pa).toBeCloseTo(inH2OToPa(10), 10)
  })

  it('builds an air state only from temperature and pressure together', () => {
    const withAir = normalizeFlowRowSI(splitRecord(FlowRowSI, {
      lift_mm: 5, q_in_m3min: 1.2, temp_C: 20, baro_Pa: 100000, rh: 0.3,
    }).record)
    expect(withAir.airState?.p_Pa).toBe(100000)
    expect(withAir.airState?.T_K).toBeCloseTo(293.15, 12)
    expect(withAir.airState?.RH).toBe(0.3)

    const tempOnly = normalizeFlowRowSI(splitRecord(FlowRowSI, { lift_mm: 5, q_in_m3min: 1.2, temp_C: 20 }).record)
    expect(tempOnly.airState).toBeUndefined()
  })

  it('SI header to metres', () => {
    const header = normalizeFlowHeaderSI(splitRecord(FlowHeaderSI, HEADER_SI).record)
    expect(header.intake.valveDiameter).toBeCloseTo(0.044, 15)
    expect(header.intake.throatDiameter).toBeCloseTo(0.038, 15)
    expect(header.intake.seatWidth).toBeUndefined()
    expect(header.intake.valveCount).toBe(1)
    expect(header.intake.window?.width).toBeCloseTo(0.04, 15)
    expect(header.intake.window?.rTop).toBeCloseTo(0.005, 15)
    expect(header.intake.window?.rBottom).toBe(0)
    expect(header.exhaust.window).toBeUndefined()
    expect(header.maxLift).toBeCloseTo(0.012, 15)
    expect(header.port).toEqual({ volume: undefined, length: undefined, area: undefined })
  })
})

describe('parseFlowTest', () => {
  it('collects extras per record', () => {
    const parsed = parseFlowTest('SI', { ...HEADER_SI, ex_pipe_used: true }, [
      { lift_mm: 2, q_in_m3min: 0.5, note: 'first' },
      { lift_mm: 4, q_in_m3min: 1.0 },
    ])
    expect(parsed.rows).toHaveLength(2)
    expect(parsed.headerExtras).toEqual({ ex_pipe_used: true })
    expect(parsed.rowExtras).toEqual([{ note: 'first' }, {}])
  })

  it('names the failing row', () => {
    expect(() => parseFlowTest('SI', HEADER_SI, [
      { lift_mm: 2, q_in_m3min: 0.5 },
      { lift_mm: 4, q_in_m3min: -1 },
    ])).toThrow(/^computeFlowTest\.rows\[1\]: q_in_m3min/)
  })

  it('uses the US schema for US tests', () => {
    expect(() => parseFlowTest('US', HEADER_SI, [])).toThrow(/^computeFlowTest\.header/)
  })
})

describe('legacy US keys', () => {
  it('q_cfm becomes the intake flow', () => {
    expect(adoptLegacyUSRow({ lift_in: 0.5, q_cfm: 250 })).toEqual({ lift_in: 0.5, q_in_cfm: 250 })
  })

  it('a current key wins and the legacy one is kept', () => {
    expect(adoptLegacyUSRow({ q_in_cfm: 240, q_cfm: 250 })).toEqual({ q_in_cfm: 240, q_cfm: 250 })
  })

  it('header millimetres become inches, zero window sizes are dropped', () => {
    const h = adoptLegacyUSHeader({ d_valve_in_mm: 50.8, ex_width_mm: 0, ex_r_top_mm: 0, cr: 10 })
    const { record, extras } = splitRecord(FlowHeaderUS.partial(), h)
    expect(extras).toEqual({})
    expect(record.ex_width_in).toBeUndefined()
    expect(record.cr).toBe(10)
    expect(record.d_valve_in_in).toBeCloseTo(2, 12)
    expect(record.ex_r_top_in).toBe(0)
  })

  it('leaves non-objects alone', () => {
    expect(adoptLegacyUSRow(42)).toBe(42)
    expect(adoptLegacyUSRow(null)).toBeNull()
  })

  it('normalizes a report-parser header', () => {
    const { record } = splitRecord(FlowHeaderUS, adoptLegacyUSHeader({
      d_valve_in_mm: 50.8, d_valve_ex_mm: 38.1, cr: 10, max_lift_mm: 12.7,
    }))
    expect(record.d_valve_in_in).toBeCloseTo(2, 12)
    expect(record.max_lift_in).toBeCloseTo(0.5, 12)
  })
})
