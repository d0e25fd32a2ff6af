// src/core/locators/LocatorResolver.ts

export type LocatorStrategy = 'xpath' | 'css' | 'id' | 'class' | 'name';

export type SelectorEngine = 'css' | 'xpath';

export interface NativeSelector {
  strategy: LocatorStrategy;
  engine: SelectorEngine;
  expression: string;
}

interface PrefixRule {
  prefix: string;
  strategy: LocatorStrategy;
  engine: SelectorEngine;
  build(value: string): string;
}

// Checked in this order, anchored at the start of the locator.
const PREFIX_RULES: readonly PrefixRule[] = [
  { prefix: 'xpath=', strategy: 'xpath', engine: 'xpath', build: value => value },
  { prefix: 'css=', strategy: 'css', engine: 'css', build: value => value },
  { prefix: 'id=', strategy: 'id', engine: 'css', build: value => `#${value}` },
  { prefix: 'class=', strategy: 'class', engine: 'css', build: value => `.${value}` },
  { prefix: 'name=', strategy: 'name', engine: 'css', build: value => `[name='${value}']` }
];

const PLACEHOLDER_PATTERN = /%s|\{index\}/g;

export class LocatorResolver {
  private constructor() {}

  static resolve(locator: string): NativeSelector {
    for (const rule of PREFIX_RULES) {
      if (locator.startsWith(rule.prefix)) {
        return {
          strategy: rule.strategy,
          engine: rule.engine,
          expression: rule.build(locator.slice(rule.prefix.length))
        };
      }
    }

    return { strategy: 'css', engine: 'css', expression: locator };
  }

  static countPlaceholders(locator: string): number {
    return locator.match(PLACEHOLDER_PATTERN)?.length ?? 0;
  }

  static hasPlaceholder(locator: string): boolean {
    return LocatorResolver.countPlaceholders(locator) > 0;
  }

  /**
   * Substitutes every placeholder occurrence with `parameter`. A replacer
   * function keeps `$` sequences in the parameter literal.
   */
  static applyParameter(locator: string, parameter: string): string {
    return locator.replace(PLACEHOLDER_PATTERN, () => parameter);
  }

  static toPlaywrightSelector(selector: NativeSelector): string {
    return selector.engine === 'xpath' ? `xpath=${selector.expression}` : selector.expression;
  }

  static describe(selector: NativeSelector): string {
    return `${selector.strategy}: ${selector.expression}`;
  }
}
