// P(u) curves. u is a utilisation fraction, above 1 when a task outruns its cores; result in Watts.

export type CurveFn = (fraction: number) => number;

// P = P_idle + (P_max - P_idle) * u
export function minMaxLinearCurve(minWatts: number, maxWatts: number): CurveFn {
    return (fraction) => minWatts + fraction * (maxWatts - minWatts);
}

export function fittedLinearCurve(coefficient: number, intercept: number): CurveFn {
    return (fraction) => coefficient * fraction + intercept;
}

/**
 * Coefficients from the highest degree down to the constant term,
 * e.g. [a, b, c] => a*u^2 + b*u + c.
 */
export function polynomialCurve(coefficients: readonly number[]): CurveFn {
    const coeffs = [...coefficients];
    return (fraction) => {
        let acc = 0;
        for (const c of coeffs) {
            acc = acc * fraction + c;
        }
        return acc;
    };
}
