/**
 * Deterministic Math
 *
 * Software sine, cosine, arctangent and square root built only from IEEE-754
 * addition, multiplication and division, which are correctly rounded on every
 * JS engine. Math.sin/cos/atan2 are implementation-approximated and may differ
 * between engines or builds, so the simulation never calls them: every
 * resimulating instance evaluates exactly these polynomials.
 *
 * Angles in the engine are degrees; the *Deg helpers reduce in degrees first
 * so quarter turns come out exact (sinDeg(180) === 0).
 */

const PI = 3.141592653589793;
const HALF_PI = PI / 2;
const DEG_TO_RAD = PI / 180;
const RAD_TO_DEG = 180 / PI;

/** Cody-Waite split of PI/2 for argument reduction. */
const HALF_PI_HI = 1.5707963267341256;
const HALF_PI_LO = 6.077100506506192e-11;

/** tan(PI/12) = 2 - sqrt(3) */
const TAN_PI_12 = 0.2679491924311227;
const SQRT3 = 1.7320508075688772;
const PI_6 = PI / 6;

export { PI, HALF_PI, DEG_TO_RAD, RAD_TO_DEG };

// ──────────────────────────────────────────────────────────
// Kernels (|x| <= PI/4)
// ──────────────────────────────────────────────────────────

function sinKernel(x: number): number {
  const x2 = x * x;
  return x * (1 + x2 * (-1 / 6 + x2 * (1 / 120 + x2 * (-1 / 5040 + x2 * (1 / 362880
    + x2 * (-1 / 39916800 + x2 * (1 / 6227020800 + x2 * (-1 / 1307674368000))))))));
}

function cosKernel(x: number): number {
  const x2 = x * x;
  return 1 + x2 * (-1 / 2 + x2 * (1 / 24 + x2 * (-1 / 720 + x2 * (1 / 40320
    + x2 * (-1 / 3628800 + x2 * (1 / 479001600 + x2 * (-1 / 87178291200
    + x2 * (1 / 20922789888000))))))));
}

/** atan for |u| <= tan(PI/12). */
function atanKernel(u: number): number {
  const u2 = u * u;
  return u * (1 + u2 * (-1 / 3 + u2 * (1 / 5 + u2 * (-1 / 7 + u2 * (1 / 9 + u2 * (-1 / 11
    + u2 * (1 / 13 + u2 * (-1 / 15 + u2 * (1 / 17 + u2 * (-1 / 19 + u2 * (1 / 21)))))))))));
}

/** Select sin/cos of a reduced angle by quadrant (0..3). */
function quadrantSin(quadrant: number, s: number, c: number): number {
  switch (quadrant) {
    case 0: return s;
    case 1: return c;
    case 2: return -s;
    default: return -c;
  }
}

function quadrantCos(quadrant: number, s: number, c: number): number {
  switch (quadrant) {
    case 0: return c;
    case 1: return -s;
    case 2: return -c;
    default: return s;
  }
}

function mod4(q: number): number {
  return ((q % 4) + 4) % 4;
}

// ──────────────────────────────────────────────────────────
// Radians
// ──────────────────────────────────────────────────────────

/** Reduce radians to (quadrant, remainder in [-PI/4, PI/4]). */
function reduceRadians(x: number): { quadrant: number; r: number } {
  const q = Math.round(x / HALF_PI);
  const r = (x - q * HALF_PI_HI) - q * HALF_PI_LO;
  return { quadrant: mod4(q), r };
}

export function sin(x: number): number {
  if (!Number.isFinite(x)) return NaN;
  const { quadrant, r } = reduceRadians(x);
  return quadrantSin(quadrant, sinKernel(r), cosKernel(r));
}

export function cos(x: number): number {
  if (!Number.isFinite(x)) return NaN;
  const { quadrant, r } = reduceRadians(x);
  return quadrantCos(quadrant, sinKernel(r), cosKernel(r));
}

export function atan(t: number): number {
  if (Number.isNaN(t)) return NaN;
  if (t === Infinity) return HALF_PI;
  if (t === -Infinity) return -HALF_PI;

  const negative = t < 0;
  let a = negative ? -t : t;
  let offset = 0;
  let invert = false;

  if (a > 1) {
    a = 1 / a;
    invert = true;
  }
  if (a > TAN_PI_12) {
    // atan(a) = PI/6 + atan((a*sqrt3 - 1) / (sqrt3 + a))
    a = (a * SQRT3 - 1) / (SQRT3 + a);
    offset = PI_6;
  }

  let result = offset + atanKernel(a);
  if (invert) result = HALF_PI - result;
  return negative ? -result : result;
}

/** Four-quadrant arctangent, radians in (-PI, PI]. */
export function atan2(y: number, x: number): number {
  if (Number.isNaN(x) || Number.isNaN(y)) return NaN;
  if (x > 0) return atan(y / x);
  if (x < 0) return y >= 0 ? atan(y / x) + PI : atan(y / x) - PI;
  if (y > 0) return HALF_PI;
  if (y < 0) return -HALF_PI;
  return 0;
}

/**
 * Square root by Newton iteration on a mantissa scaled into [0.25, 1).
 * Scaling by powers of 4 and unscaling by powers of 2 are exact.
 */
export function sqrt(x: number): number {
  if (Number.isNaN(x) || x < 0) return NaN;
  if (x === 0 || x === Infinity) return x;

  let m = x;
  let scale = 1;
  while (m >= 1) {
    m *= 0.25;
    scale *= 2;
  }
  while (m < 0.25) {
    m *= 4;
    scale *= 0.5;
  }

  // Linear seed on [0.25, 1): max relative error ~6%, six iterations reach full precision.
  let g = 0.41421356 + 0.59 * m;
  for (let i = 0; i < 6; i++) {
    g = 0.5 * (g + m / g);
  }
  return g * scale;
}

// ──────────────────────────────────────────────────────────
// Degrees
// ──────────────────────────────────────────────────────────

/** Reduce degrees to (quadrant, remainder in radians within [-PI/4, PI/4]). */
function reduceDegrees(deg: number): { quadrant: number; r: number } {
  const d = deg % 360;
  const q = Math.round(d / 90);
  return { quadrant: mod4(q), r: (d - q * 90) * DEG_TO_RAD };
}

export function sinDeg(deg: number): number {
  if (!Number.isFinite(deg)) return NaN;
  const { quadrant, r } = reduceDegrees(deg);
  return quadrantSin(quadrant, sinKernel(r), cosKernel(r));
}

export function cosDeg(deg: number): number {
  if (!Number.isFinite(deg)) return NaN;
  const { quadrant, r } = reduceDegrees(deg);
  return quadrantCos(quadrant, sinKernel(r), cosKernel(r));
}

/** atan2 in degrees, (-180, 180]. */
export function atan2Deg(y: number, x: number): number {
  return atan2(y, x) * RAD_TO_DEG;
}

/** Wrap degrees into [0, 360). */
export function normalizeDegrees(deg: number): number {
  let r = deg % 360;
  if (r < 0) r += 360;
  // -1e-17 + 360 rounds to 360
  if (r >= 360) r -= 360;
  return r;
}

/** Wrap degrees into (-180, 180]. */
export function wrapDegrees(deg: number): number {
  const r = normalizeDegrees(deg);
  return r > 180 ? r - 360 : r;
}

export function clamp(value: number, min: number, max: number): number {
  return value < min ? min : value > max ? max : value;
}
