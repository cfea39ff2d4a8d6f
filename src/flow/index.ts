/**
 * Flow module — public API.
 *
 * This is the barrel export for the port-flow engine.
 * Everything in this directory is UI-independent: callers hand in
 * structured records and render what comes back.
 */

export { InvalidArgumentError, InvalidGeometryError, UnavailableError, CalibrationDriftError, isInvalidArgument, requirePositive, requireNonNegative } from './errors.ts'
export type { DriftEntry } from './errors.ts'
export {
  MM_PER_IN, MM2_PER_IN2, CC_PER_IN3, M3MIN_PER_CFM, M_PER_FT, PA_PER_IN_H2O, REFERENCE_DEPRESSION_IN_H2O,
  mmToIn, inToMm, mm2ToIn2, in2ToMm2, ccToIn3, in3ToCc, cfmToM3min, m3minToCfm, m3minToM3s, m3sToM3min,
  cfmToM3s, m3sToCfm, ftsToMs, msToFts, inH2OToPa, paToInH2O, cToK, fToK,
  QUANTITY_UNITS, fromSI, toSI, seriesFromSI, unitLabel, unitLabels, ldAxisTick, formatCorrex,
} from './units.ts'
export type { UnitSystem, QuantityKind } from './units.ts'
export { GAMMA_AIR, R_AIR, makeAirState, STANDARD_AIR, saturationVaporPressure, airDensity, speedOfSound } from './air-state.ts'
export type { AirState } from './air-state.ts'
export { flowReferenced, flowTo28InH2O, flowToReferenceDepression } from './flow-correction.ts'
export {
  DEFAULT_EFFECTIVE_AREA, curtainArea, throatArea, ldRatio, portWindowArea,
  effectiveAreaSmoothMin, logisticWeight, effectiveAreaLogistic, seatLiftThreshold, seatLimitedArea, effectiveArea,
  portVolume, portAreaFromVolume, portLengthFromVolume, solvePortDimensions,
} from './geometry.ts'
export type { ValveGeometry, PortWindow, BlendStrategy, EffectiveAreaOptions, PortDimensions } from './geometry.ts'
export { cd, saeCd, effectiveCd, STANDARD_REFERENCE } from './coefficients.ts'
export type { ReferenceCondition } from './coefficients.ts'
export {
  velocityFromFlow, machFromVelocity, machAtMinArea, meanPortVelocityFromMach, velocityPitot, portEnergyDensity,
  swirlNumber, tumbleNumber, swirlRatioFromWheel,
} from './kinematics.ts'
export type { FlowSample } from './kinematics.ts'
export {
  engineVolumetricFlow, rpmFromFlow, rpmFromAreaAndTargetVelocity, engineDisplacement, meanPistonSpeed, exhaustPrimaryArea,
  mainScreenA0, portFlowCapacity, peakRpmFromPortArea, portAreaFromPeakRpm, shiftRpm, compressionCorrection, torquePeakRpm,
  portAreaPowerLimit, airflowPowerLimit, exIntRatio, aggregateExIntRatio, existingExIntRatio, requiredExIntRatio,
} from './engine-coupling.ts'
export type { PortBalanceInputs, RatioAggregation, FlowPair } from './engine-coupling.ts'
export { CALIBRATION_ANCHORS, CALIBRATION_NAMES, CALIBRATION_PROFILES, PROVISIONAL_CALIBRATIONS, isCalibrationName, isCalibrationProfileName } from './calibration-anchors.ts'
export type { AnchorEntry, CalibrationName, CalibrationProfileName, CalibrationProfile } from './calibration-anchors.ts'
export { CalibrationRegistry, CalibrationOverride, CalibrationOverrideBatch, createCalibrationRegistry, defaultCalibration } from './calibration.ts'
export type { CalibrationConstant, OverrideRecord, CalibrationOptions, TCalibrationOverride } from './calibration.ts'
export {
  MainInputsSI, MainInputsUS, FlowRowSI, FlowRowUS, FlowHeaderSI, FlowHeaderUS, splitRecord, SIDES,
  normalizeFlowHeaderSI, normalizeFlowHeaderUS, normalizeFlowRowSI, normalizeFlowRowUS, parseFlowTest,
  adoptLegacyKeys, adoptLegacyUSRow, adoptLegacyUSHeader,
} from './records.ts'
export type {
  TMainInputsSI, TMainInputsUS, TFlowRowSI, TFlowRowUS, TFlowHeaderSI, TFlowHeaderUS,
  SplitRecord, Side, SideGeometry, FlowHeader, FlowRow, ParsedFlowTest,
} from './records.ts'
export { DEFAULT_SERIES_OPTIONS, SERIES_KINDS, COMPARED_SERIES, valveGeometryOf, sideAreaOptions, pointsForSide, buildSideSeries, percentDelta } from './series.ts'
export type { FlowPoint, SeriesOptions, Series, SeriesKey, SideSeries } from './series.ts'
export {
  computeMainScreen, DEFAULT_FLOW_TEST_OPTIONS, flowTestHeaderMetrics, flowTestRows, FLOW_TEST_KINDS,
  convertSideSeries, computeFlowTest, compareTests,
} from './screens.ts'
export type {
  MainScreenResult, FlowTestOptions, SideHeaderMetrics, ExIntRatioMetrics, FlowTestHeaderMetrics, FlowTestRow,
  FlowTestResult, CompareMode, FlowTestInput, SeriesDelta, CompareResult,
} from './screens.ts'
