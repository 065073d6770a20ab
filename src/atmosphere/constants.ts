/**
 * Physical constants for the English-unit atmosphere model.
 */

/** Gas constant for dry air [ft·lbf/(slug·°R)] */
export const GAS_CONSTANT = 1716

/** Ratio of specific heats for air */
export const GAMMA = 1.4

/** γ/2, as in q = (γ/2)·p·M² */
export const HALF_GAMMA = 0.7

// ─── Sutherland's Law ────────────────────────────────────────────────────────

/** Below this temperature [°R] viscosity uses the linear approximation */
export const SUTHERLAND_LINEAR_LIMIT = 225

/** Above this temperature [°R] Sutherland's law is not validated */
export const SUTHERLAND_VALID_LIMIT = 5400

/** Linear-branch slope [(lbf·s)/(ft²·°R)] */
export const SUTHERLAND_LINEAR_SLOPE = 8.0382436e-10

/** Sutherland coefficient [(lbf·s)/(ft²·√°R)] */
export const SUTHERLAND_C1 = 2.27e-8

/** Sutherland temperature [°R] */
export const SUTHERLAND_S = 198.6
