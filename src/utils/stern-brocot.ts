import { DEFAULTS } from '../config';
import { PrecisionError } from '../errors';
import { Logger } from '../types/common';

/**
 * Options for the mediant search.
 */
export interface MediantSearchOptions {
  /** Receives a debug entry once the search converges. */
  logger?: Logger;
  /** Denominator ceiling; defaults to the safe-integer limit. */
  maxSearchDenominator?: number;
}

/**
 * Outcome of a mediant search over [0, 1].
 */
export interface MediantSearchResult {
  numerator: number;
  denominator: number;
  /** Depth reached in the Stern-Brocot tree. */
  steps: number;
}

type Move = 'upper' | 'lower' | 'accept';

function classify(numerator: number, denominator: number, low: number, high: number): Move {
  if (numerator >= high * denominator) return 'upper';
  if (numerator <= low * denominator) return 'lower';
  return 'accept';
}

/**
 * Length of a run of identical moves.
 *
 * `estimate` comes from solving the move predicate for the run length in
 * closed form; rounding can put it off by one either way, so it is
 * corrected against `holds`, which is monotone in the run length.
 */
function runLength(
  estimate: number,
  holds: (k: number) => boolean,
  maxSearchDenominator: number,
): number {
  if (!Number.isFinite(estimate) || estimate > maxSearchDenominator) {
    throw new PrecisionError(
      `Mediant search exceeded the denominator limit of ${maxSearchDenominator}`,
      { maxSearchDenominator },
    );
  }

  let k = Math.max(1, Math.floor(estimate));
  while (k > 1 && !holds(k)) k--;
  while (k < maxSearchDenominator && holds(k + 1)) k++;
  return k;
}

/**
 * Walk the Stern-Brocot tree between 0/1 and 1/1 towards `frac` and return
 * the first mediant lying strictly inside `(frac - tolerance, frac + tolerance)`.
 *
 * Consecutive moves towards the same side are taken as one batch (a
 * continued-fraction partial quotient), so the loop runs once per term of
 * the expansion rather than once per tree level. The answer is the same
 * mediant the level-by-level walk would stop at.
 *
 * @throws PrecisionError once a denominator would pass `maxSearchDenominator`.
 */
export function searchMediant(
  frac: number,
  tolerance: number,
  options: MediantSearchOptions = {},
): MediantSearchResult {
  const maxSearchDenominator = options.maxSearchDenominator ?? DEFAULTS.maxSearchDenominator;
  const high = frac + tolerance;
  const low = frac - tolerance;

  let lowerN = 0;
  let lowerD = 1;
  let upperN = 1;
  let upperD = 1;
  let steps = 0;

  for (;;) {
    const mediantN = lowerN + upperN;
    const mediantD = lowerD + upperD;
    if (mediantD > maxSearchDenominator) {
      throw new PrecisionError(
        `Mediant search exceeded the denominator limit of ${maxSearchDenominator}`,
        { maxSearchDenominator, frac, tolerance },
      );
    }

    const move = classify(mediantN, mediantD, low, high);

    if (move === 'accept') {
      steps++;
      options.logger?.debug('searchMediant: converged', {
        numerator: mediantN,
        denominator: mediantD,
        steps,
      });
      return { numerator: mediantN, denominator: mediantD, steps };
    }

    if (move === 'upper') {
      // upper := k * lower + upper, for the largest k still above the window
      const run = runLength(
        (upperN - high * upperD) / (high * lowerD - lowerN),
        (k) => classify(k * lowerN + upperN, k * lowerD + upperD, low, high) === 'upper',
        maxSearchDenominator,
      );
      upperN += run * lowerN;
      upperD += run * lowerD;
      steps += run;
    } else {
      // lower := lower + k * upper, for the largest k still below the window
      const run = runLength(
        (low * lowerD - lowerN) / (upperN - low * upperD),
        (k) => classify(lowerN + k * upperN, lowerD + k * upperD, low, high) === 'lower',
        maxSearchDenominator,
      );
      lowerN += run * upperN;
      lowerD += run * upperD;
      steps += run;
    }
  }
}
