/**
 * Numeric width the clipper computes in.
 *
 * Interpolated coordinates are produced by `lerp`, which evaluates
 * `origin + delta * num / den` the way the type would: integer types
 * truncate the quotient toward zero and wrap the sum to their width.
 */
export interface CoordinateType {
    readonly name: "int16" | "int32" | "float64";
    readonly min: number;
    readonly max: number;

    fits(v: number): boolean;
    narrow(v: number): number;
    lerp(origin: number, delta: number, num: number, den: number): number;
}

function integerFits(min: number, max: number) {
    return (v: number) => Number.isInteger(v) && v >= min && v <= max;
}

export const INT16: CoordinateType = {
    name: "int16",
    min: -0x8000,
    max: 0x7fff,
    fits: integerFits(-0x8000, 0x7fff),
    narrow: (v) => (v << 16) >> 16,
    // |delta * num| < 2^32, well inside the exact range of a double.
    lerp: (origin, delta, num, den) => ((origin + Math.trunc(delta * num / den)) << 16) >> 16,
};

export const INT32: CoordinateType = {
    name: "int32",
    min: -0x80000000,
    max: 0x7fffffff,
    fits: integerFits(-0x80000000, 0x7fffffff),
    narrow: (v) => v | 0,
    lerp: (origin, delta, num, den) => {
        const product = delta * num;
        const q = Number.isSafeInteger(product) ?
            Math.trunc(product / den) :
            Number(BigInt(delta) * BigInt(num) / BigInt(den));
        return (origin + q) | 0;
    },
};

export const FLOAT64: CoordinateType = {
    name: "float64",
    min: -Number.MAX_VALUE,
    max: Number.MAX_VALUE,
    fits: (v) => Number.isFinite(v),
    narrow: (v) => v,
    lerp: (origin, delta, num, den) => origin + delta * num / den,
};
