import { searchMediant } from '../src/utils/stern-brocot';
import { PrecisionError } from '../src/errors';
import { Logger } from '../src/types/common';

/**
 * Level-by-level reference walk: one mediant per iteration.
 */
function walk(frac: number, tolerance: number): { numerator: number; denominator: number; steps: number } {
  let lowerN = 0;
  let lowerD = 1;
  let upperN = 1;
  let upperD = 1;
  let steps = 0;
  for (;;) {
    const n = lowerN + upperN;
    const d = lowerD + upperD;
    steps++;
    if (n >= (frac + tolerance) * d) {
      upperN = n;
      upperD = d;
    } else if (n <= (frac - tolerance) * d) {
      lowerN = n;
      lowerD = d;
    } else {
      return { numerator: n, denominator: d, steps };
    }
  }
}

describe('searchMediant', () => {
  it('stops at the first mediant inside the window', () => {
    expect(searchMediant(0.5, 0.1)).toEqual({ numerator: 1, denominator: 2, steps: 1 });
    expect(searchMediant(0.1415926, 0.01)).toEqual({ numerator: 1, denominator: 7, steps: 6 });
  });

  it('moves past a mediant on the window edge', () => {
    expect(searchMediant(0.75, 0.25)).toEqual({ numerator: 2, denominator: 3, steps: 2 });
  });

  it.each<[number, number]>([
    [0.323833, 0.001],
    [0.394823, 0.01],
    [0.072436, 1e-6],
    [0.09413, 1e-6],
    [0.057999, 1e-6],
    [0.214698, 0.01],
    [0.433646, 0.01],
    [0.240663, 1e-6],
    [Math.PI - 3, 1e-7],
    [Math.E - 2, 1e-9],
  ])('matches the level-by-level walk for %f within %f', (frac, tolerance) => {
    expect(searchMediant(frac, tolerance)).toEqual(walk(frac, tolerance));
  });

  it('takes long runs in one batch', () => {
    const result = searchMediant(1e-10, 1e-12);
    expect(result.numerator).toBe(1);
    expect(result.denominator).toBe(9900990100);
    expect(result.steps).toBe(9900990099);
  });

  it('throws once the denominator limit is passed', () => {
    expect(() => searchMediant(Math.PI - 3, 1e-5, { maxSearchDenominator: 100 })).toThrow(PrecisionError);
  });

  it('terminates when the window is narrower than float spacing', () => {
    expect(() => searchMediant(0.5, 1e-300)).toThrow(PrecisionError);
  });

  it('logs convergence', () => {
    const logger: Logger = { debug: jest.fn(), info: jest.fn(), error: jest.fn() };
    searchMediant(0.75, 0.25, { logger });
    expect(logger.debug).toHaveBeenCalledTimes(1);
    expect(logger.debug).toHaveBeenCalledWith('searchMediant: converged', {
      numerator: 2,
      denominator: 3,
      steps: 2,
    });
  });
});
