/**
 * Complex number utilities for state vectors and dense gate matrices.
 *
 * Amplitudes are complex numbers a + bi. State vectors keep them
 * interleaved in a Float64Array; these helpers work on the object form.
 */

/**
 * Complex number interface
 */
export interface Complex {
  real: number;
  imag: number;
}

/**
 * Row-major square matrix of complex entries
 */
export type ComplexMatrix = Complex[][];

/**
 * Create a complex number
 */
export function complex(real: number, imag: number = 0): Complex {
  return { real, imag };
}

export const ZERO: Complex = { real: 0, imag: 0 };

export const ONE: Complex = { real: 1, imag: 0 };

export const I: Complex = { real: 0, imag: 1 };

/**
 * |z|² = a² + b², the probability weight of an amplitude
 */
export function magnitudeSquared(c: Complex): number {
  return c.real * c.real + c.imag * c.imag;
}

/**
 * z* = a - bi
 */
export function conjugate(c: Complex): Complex {
  return { real: c.real, imag: -c.imag };
}

export function add(a: Complex, b: Complex): Complex {
  return {
    real: a.real + b.real,
    imag: a.imag + b.imag,
  };
}

export function subtract(a: Complex, b: Complex): Complex {
  return {
    real: a.real - b.real,
    imag: a.imag - b.imag,
  };
}

/**
 * (a1 + b1 i)(a2 + b2 i) = (a1 a2 - b1 b2) + (a1 b2 + a2 b1) i
 */
export function multiply(a: Complex, b: Complex): Complex {
  return {
    real: a.real * b.real - a.imag * b.imag,
    imag: a.real * b.imag + a.imag * b.real,
  };
}

export function scale(c: Complex, s: number): Complex {
  return {
    real: c.real * s,
    imag: c.imag * s,
  };
}

/**
 * e^(iθ) = cos θ + i sin θ
 */
export function expi(theta: number): Complex {
  return {
    real: Math.cos(theta),
    imag: Math.sin(theta),
  };
}

/**
 * Approximate equality on both components
 */
export function equals(a: Complex, b: Complex, tolerance: number = 1e-10): boolean {
  return (
    Math.abs(a.real - b.real) < tolerance && Math.abs(a.imag - b.imag) < tolerance
  );
}

/**
 * Unpack [re0, im0, re1, im1, ...] into complex numbers
 */
export function fromInterleaved(arr: Float64Array): Complex[] {
  const result: Complex[] = [];
  for (let i = 0; i < arr.length; i += 2) {
    result.push({ real: arr[i], imag: arr[i + 1] });
  }
  return result;
}

export function toInterleaved(complexArray: readonly Complex[]): Float64Array {
  const result = new Float64Array(complexArray.length * 2);
  for (let i = 0; i < complexArray.length; i++) {
    result[i * 2] = complexArray[i].real;
    result[i * 2 + 1] = complexArray[i].imag;
  }
  return result;
}

/**
 * <a|b> = Σ conj(a_i) b_i
 */
export function innerProduct(a: readonly Complex[], b: readonly Complex[]): Complex {
  if (a.length !== b.length) {
    throw new Error('Vectors must have same length');
  }
  let result = ZERO;
  for (let i = 0; i < a.length; i++) {
    result = add(result, multiply(conjugate(a[i]), b[i]));
  }
  return result;
}

/**
 * ||v|| = sqrt(<v|v>)
 */
export function norm(v: readonly Complex[]): number {
  let sum = 0;
  for (const c of v) {
    sum += magnitudeSquared(c);
  }
  return Math.sqrt(sum);
}

// ============================================================================
// Matrices
// ============================================================================

/**
 * n x n identity
 */
export function identityMatrix(size: number): ComplexMatrix {
  return Array.from({ length: size }, (_, r) =>
    Array.from({ length: size }, (_, c) => (r === c ? ONE : ZERO))
  );
}

/**
 * M† (conjugate transpose)
 */
export function conjugateTranspose(matrix: ComplexMatrix): ComplexMatrix {
  const rows = matrix.length;
  const cols = rows === 0 ? 0 : matrix[0].length;
  return Array.from({ length: cols }, (_, r) =>
    Array.from({ length: rows }, (_, c) => conjugate(matrix[c][r]))
  );
}

/**
 * Matrix product A·B
 */
export function matrixMultiply(a: ComplexMatrix, b: ComplexMatrix): ComplexMatrix {
  const inner = b.length;
  if (a.length > 0 && a[0].length !== inner) {
    throw new Error(`Cannot multiply ${a.length}x${a[0].length} by ${inner}x${b[0]?.length ?? 0}`);
  }
  const cols = inner === 0 ? 0 : b[0].length;
  return a.map((row) =>
    Array.from({ length: cols }, (_, c) => {
      let sum = ZERO;
      for (let k = 0; k < inner; k++) {
        sum = add(sum, multiply(row[k], b[k][c]));
      }
      return sum;
    })
  );
}
