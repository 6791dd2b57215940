export type LinearFit = {
  slope: number;
  intercept: number;
  rSquared: number;
};

/**
 * Ordinary least squares of y on x. Coefficients are NaN when x has no
 * spread; R² is NaN when y has none.
 */
export function fitLinear(xs: readonly number[], ys: readonly number[]): LinearFit {
  const n = Math.min(xs.length, ys.length);
  if (n === 0) return { slope: Number.NaN, intercept: Number.NaN, rSquared: Number.NaN };

  let sumX = 0;
  let sumY = 0;
  for (let i = 0; i < n; i += 1) {
    sumX += xs[i] ?? 0;
    sumY += ys[i] ?? 0;
  }
  const meanX = sumX / n;
  const meanY = sumY / n;

  let sxx = 0;
  let sxy = 0;
  for (let i = 0; i < n; i += 1) {
    const dx = (xs[i] ?? 0) - meanX;
    sxx += dx * dx;
    sxy += dx * ((ys[i] ?? 0) - meanY);
  }
  if (sxx === 0) return { slope: Number.NaN, intercept: Number.NaN, rSquared: Number.NaN };

  const slope = sxy / sxx;
  const intercept = meanY - slope * meanX;

  let ssTot = 0;
  let ssRes = 0;
  for (let i = 0; i < n; i += 1) {
    const y = ys[i] ?? 0;
    ssTot += (y - meanY) ** 2;
    ssRes += (y - (intercept + slope * (xs[i] ?? 0))) ** 2;
  }

  return { slope, intercept, rSquared: ssTot === 0 ? Number.NaN : 1 - ssRes / ssTot };
}
