/**
 * Numeric Types
 *
 * Both modules are exported as namespaces to avoid function name conflicts
 * (`add`, `toString` and `inverse` read differently for decimals and matrices).
 *
 * @example
 * ```typescript
 * import { BigDecOps, MatrixOps } from "@symcalc/math";
 *
 * BigDecOps.toString(BigDecOps.add(BigDecOps.bigDecimal("0.1"), BigDecOps.bigDecimal("0.2"))); // "0.3"
 * MatrixOps.determinant(MatrixOps.identity(3)); // 1
 * ```
 */

export * as BigDecOps from "./bigdecimal.js";
export * as MatrixOps from "./matrix.js";
