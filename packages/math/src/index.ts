/**
 * @symcalc/math
 *
 * This package provides:
 * - **BigDecimal**: bigint-backed decimals with exact `+ - *`, significant-digit
 *   division and half-up rounding
 * - **Matrix**: column-vector matrices with echelon form, reduced row echelon
 *   form, determinant, inverse and characteristic polynomial
 *
 * @packageDocumentation
 */

export { BigDecOps, MatrixOps } from "./types/index.js";
export type { BigDecimal, RoundingMode } from "./types/bigdecimal.js";
export type { Matrix } from "./types/matrix.js";
export { bigDecimal } from "./types/bigdecimal.js";
export { matrix, fromRows, identity, formatMatrix } from "./types/matrix.js";
