import { describe, it, expect } from "vitest";
import { MatrixOps } from "../src/index.js";
import { SingularMatrixError } from "@symcalc/core";

const {
  matrix,
  fromRows,
  zeros,
  identity,
  rows,
  cols,
  get,
  row,
  col,
  toArray,
  transpose,
  matMul,
  trace,
  echelon,
  rowReduce,
  rank,
  determinant,
  inverse,
  characteristicPolynomial,
  approxEquals,
  formatMatrix,
} = MatrixOps;

describe("Matrix", () => {
  describe("constructors", () => {
    it("creates a matrix from columns", () => {
      const m = matrix([
        [1, 4],
        [2, 5],
        [3, 6],
      ]);
      expect(rows(m)).toBe(2);
      expect(cols(m)).toBe(3);
      expect(get(m, 0, 2)).toBe(3);
      expect(get(m, 1, 0)).toBe(4);
    });

    it("throws for mismatched column lengths", () => {
      expect(() => matrix([[1, 2], [3]])).toThrow(RangeError);
      expect(() => matrix([])).toThrow(RangeError);
    });

    it("creates from rows", () => {
      const m = fromRows([
        [1, 2, 3],
        [4, 5, 6],
      ]);
      expect(row(m, 1)).toEqual([4, 5, 6]);
      expect(col(m, 2)).toEqual([3, 6]);
    });

    it("creates zero and identity matrices", () => {
      expect(toArray(zeros(2, 3))).toEqual([
        [0, 0, 0],
        [0, 0, 0],
      ]);
      expect(toArray(identity(2))).toEqual([
        [1, 0],
        [0, 1],
      ]);
    });

    it("copies its input", () => {
      const column = [1, 2];
      const m = matrix([column]);
      column[0] = 99;
      expect(get(m, 0, 0)).toBe(1);
    });
  });

  describe("basic operations", () => {
    it("transposes", () => {
      const t = transpose(
        fromRows([
          [1, 2, 3],
          [4, 5, 6],
        ])
      );
      expect(toArray(t)).toEqual([
        [1, 4],
        [2, 5],
        [3, 6],
      ]);
    });

    it("multiplies", () => {
      const a = fromRows([
        [1, 2, 3],
        [4, 5, 6],
      ]);
      const b = fromRows([
        [7, 8],
        [9, 10],
        [11, 12],
      ]);
      expect(toArray(matMul(a, b))).toEqual([
        [58, 64],
        [139, 154],
      ]);
      expect(() => matMul(a, a)).toThrow(RangeError);
    });

    it("computes trace", () => {
      expect(
        trace(
          fromRows([
            [1, 2, 3],
            [4, 5, 6],
            [7, 8, 9],
          ])
        )
      ).toBe(15);
    });
  });

  describe("elimination", () => {
    const m = fromRows([
      [1, 3, 5],
      [8, 30, 2],
      [1, 89, 2],
    ]);

    it("reduces a nonsingular matrix to the identity", () => {
      expect(toArray(rowReduce(m))).toEqual(toArray(identity(3)));
    });

    it("does not mutate its input", () => {
      rowReduce(m);
      expect(row(m, 0)).toEqual([1, 3, 5]);
    });

    it("produces zeros below the pivots in echelon form", () => {
      const e = toArray(echelon(m));
      expect(e[0]).toEqual([8, 30, 2]);
      expect(e[1][0]).toBe(0);
      expect(e[2][0]).toBe(0);
      expect(e[2][1]).toBe(0);
    });

    it("skips columns without a pivot", () => {
      const r = rowReduce(
        fromRows([
          [0, 2, 4],
          [0, 1, 3],
        ])
      );
      expect(toArray(r)).toEqual([
        [0, 1, 0],
        [0, 0, 1],
      ]);
    });

    it("treats entries below epsilon as zero", () => {
      const r = rowReduce(
        fromRows([
          [1e-7, 1],
          [0, 1],
        ])
      );
      expect(toArray(r)).toEqual([
        [0, 1],
        [0, 0],
      ]);
    });

    it("computes rank", () => {
      expect(
        rank(
          fromRows([
            [1, 2],
            [2, 4],
          ])
        )
      ).toBe(1);
    });
  });

  describe("determinant", () => {
    it("computes small determinants", () => {
      expect(
        determinant(
          fromRows([
            [1, 2],
            [3, 4],
          ])
        )
      ).toBeCloseTo(-2, 10);
      expect(
        determinant(
          fromRows([
            [1, 3, 5],
            [8, 30, 2],
            [1, 89, 2],
          ])
        )
      ).toBeCloseTo(3250, 8);
    });

    it("tracks the sign of row swaps", () => {
      expect(
        determinant(
          fromRows([
            [0, 1],
            [1, 0],
          ])
        )
      ).toBe(-1);
    });

    it("is zero for singular matrices", () => {
      expect(
        determinant(
          fromRows([
            [1, 2],
            [2, 4],
          ])
        )
      ).toBe(0);
    });

    it("rejects non-square matrices", () => {
      expect(() => determinant(fromRows([[1, 2]]))).toThrow(RangeError);
    });
  });

  describe("inverse", () => {
    const m = fromRows([
      [4, 7],
      [2, 6],
    ]);

    it("inverts a 2x2 matrix", () => {
      const inv = inverse(m);
      expect(approxEquals(inv, fromRows([[0.6, -0.7], [-0.2, 0.4]]), 1e-12)).toBe(true);
    });

    it("satisfies M * inverse(M) = I", () => {
      const big = fromRows([
        [1, 3, 5],
        [8, 30, 2],
        [1, 89, 2],
      ]);
      expect(approxEquals(matMul(big, inverse(big)), identity(3), 1e-9)).toBe(true);
      expect(approxEquals(inverse(inverse(big)), big, 1e-9)).toBe(true);
    });

    it("throws SingularMatrixError for singular input", () => {
      expect(() =>
        inverse(
          fromRows([
            [1, 2],
            [2, 4],
          ])
        )
      ).toThrow(SingularMatrixError);
    });
  });

  describe("characteristicPolynomial", () => {
    it("returns det(xI - A) coefficients", () => {
      expect(
        characteristicPolynomial(
          fromRows([
            [2, 0],
            [0, 3],
          ])
        )
      ).toEqual([1, -5, 6]);
      expect(
        characteristicPolynomial(
          fromRows([
            [1, 2],
            [3, 4],
          ])
        )
      ).toEqual([1, -5, -2]);
    });
  });

  describe("formatMatrix", () => {
    it("rounds entries for display", () => {
      const m = fromRows([
        [1 / 3, -0.0000001],
        [2, 1.5],
      ]);
      expect(formatMatrix(m)).toBe("[0.33333 0]\n[2 1.5]");
      expect(formatMatrix(m, 2)).toBe("[0.33 0]\n[2 1.5]");
    });
  });
});
