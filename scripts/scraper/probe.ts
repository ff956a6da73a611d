import { errorMessage } from './errors';
import { warn } from './logger';
import type { PageDriver } from './types';

export type Probe<T> = {
  label: string;
  run: () => Promise<T | null | undefined>;
};

export type ProbeHit<T> = { value: T; label: string };

/**
 * Evaluates `probes` in order and returns the first value accepted by
 * `plausible`. A probe that throws counts as a miss.
 */
export async function firstPlausible<T>(
  probes: ReadonlyArray<Probe<T>>,
  plausible: (value: T) => boolean
): Promise<ProbeHit<T> | null> {
  for (const probe of probes) {
    let value: T | null | undefined;
    try {
      value = await probe.run();
    } catch (err) {
      warn(`Probe "${probe.label}" failed: ${errorMessage(err)}`);
      continue;
    }
    if (value !== null && value !== undefined && plausible(value)) {
      return { value, label: probe.label };
    }
  }
  return null;
}

/** One probe per selector, reading the trimmed text of its first match. */
export const textProbes = <E>(page: PageDriver<E>, selectors: readonly string[], within?: E): Probe<string>[] =>
  selectors.map((selector) => ({
    label: selector,
    run: async () => {
      const [el] = await page.queryAll(selector, within);
      return el === undefined ? null : (await page.text(el)).trim();
    },
  }));

/** One probe per selector, reading `name` from its first match. */
export const attrProbes = <E>(
  page: PageDriver<E>,
  selectors: readonly string[],
  name: string,
  within?: E
): Probe<string>[] =>
  selectors.map((selector) => ({
    label: `${selector}@${name}`,
    run: async () => {
      const [el] = await page.queryAll(selector, within);
      return el === undefined ? null : page.attr(el, name);
    },
  }));

export const lengthBetween =
  (min: number, max: number) =>
  (text: string): boolean =>
    text.length >= min && text.length <= max;
