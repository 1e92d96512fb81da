/**
 * Physical and modelling constants.
 *
 * Single source of truth: modules import these rather than repeating the
 * literals.
 */

/** Standard gravity (m/s²). */
export const GRAVITY_M_S2 = 9.81;

/** Density of water (kg/m³). */
export const WATER_DENSITY_KG_M3 = 1000;

/**
 * Generator efficiency assumed when solving the characteristic equation at
 * nominal load.  The plant-specific `eta_g_n` is derived later from `P_n`.
 */
export const ASSUMED_NOMINAL_GENERATOR_EFFICIENCY = 0.95;

/** Turbine efficiency at full load, taken as equal for every turbine type. */
export const ASSUMED_NOMINAL_TURBINE_EFFICIENCY = 0.9;

/** History window used for the mean annual flow profile (years). */
export const RESIDUAL_FLOW_HISTORY_YEARS = 10;

/** 0.05 quantile of the mean annual profile ↔ flow reached 347 days a year. */
export const Q347_QUANTILE = 0.05;

/** Nominal flow = flow reached or exceeded 20 % of the time. */
export const NOMINAL_FLOW_QUANTILE = 0.8;

/** Turbine type assigned when no classification region contains the plant. */
export const DUMMY_TURBINE_TYPE = 'dummy';

/** Label attached to every power-output series. */
export const POWER_OUTPUT_LABEL = 'feedin_hydropower_plant';
