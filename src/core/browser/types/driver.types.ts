// src/core/browser/types/driver.types.ts

import { NativeSelector } from '../../locators/LocatorResolver';

export type MouseButton = 'left' | 'right';

export interface DriverClickOptions {
  button?: MouseButton;
}

export type SelectOptionTarget =
  | { label: string }
  | { value: string }
  | { index: number };

/** Conditions an element can be waited on. */
export type ElementState = 'visible' | 'clickable' | 'present' | 'invisible';

export interface SelectedOption {
  label: string;
  value: string;
}

/**
 * A lazily evaluated handle on everything matching one selector. Nothing is
 * looked up until a method runs, so a handle can be created before the
 * element exists.
 */
export interface DriverElement {
  count(): Promise<number>;
  nth(index: number): DriverElement;

  isVisible(): Promise<boolean>;
  isEnabled(): Promise<boolean>;
  isChecked(): Promise<boolean>;
  /** Resolves `false` when `state` is not reached within `timeout` ms. */
  waitFor(state: ElementState, timeout: number): Promise<boolean>;

  click(options?: DriverClickOptions): Promise<void>;
  dblclick(): Promise<void>;
  /** Fires a DOM click event without pointer simulation. */
  dispatchClick(): Promise<void>;
  hover(): Promise<void>;
  focus(): Promise<void>;
  openInNewTab(): Promise<void>;

  fill(value: string): Promise<void>;
  typeText(text: string): Promise<void>;
  clear(): Promise<void>;
  press(key: string): Promise<void>;

  inputValue(): Promise<string>;
  innerText(): Promise<string>;
  getAttribute(name: string): Promise<string | null>;
  allInnerTexts(): Promise<string[]>;

  selectOption(target: SelectOptionTarget): Promise<void>;
  selectedOption(): Promise<SelectedOption | null>;
  optionTexts(): Promise<string[]>;

  scrollIntoView(): Promise<void>;
  highlight(): Promise<void>;
}

export interface BrowserDriver {
  navigate(url: string): Promise<void>;
  find(selector: NativeSelector): DriverElement;
  currentUrl(): string;
  close(): Promise<void>;
}
