// src/index.ts

export * from './core/errors/AutomationErrors';
export { Logger, LogLevel, ConsoleTransport, prettyFormat, logger } from './core/utils/Logger';
export type { LogMetadata, LoggerConfig, LogTransport, LogInfo } from './core/utils/Logger';
export { ActionLogger } from './core/logging/ActionLogger';
export type { ActionLogEntry, ActionCategory, ActionLevel, ActionHistoryFilter } from './core/logging/ActionLogger';
export { sleep } from './core/utils/WaitUtils';

export { ConfigurationManager } from './core/configuration/ConfigurationManager';
export { EnvironmentLoader } from './core/configuration/EnvironmentLoader';
export type { HarnessConfig, BrowserSettings, BrowserName } from './core/configuration/types/config.types';

export { LocatorResolver } from './core/locators/LocatorResolver';
export type { NativeSelector, LocatorStrategy, SelectorEngine } from './core/locators/LocatorResolver';

export type { BrowserDriver, DriverElement, SelectOptionTarget, SelectedOption } from './core/browser/types/driver.types';
export { PlaywrightDriver, PlaywrightElement } from './core/browser/PlaywrightDriver';
export { BrowserManager, launchPlaywright } from './core/browser/BrowserManager';
export type { BrowserSession, BrowserLauncher, Clearable, SessionOptions } from './core/browser/BrowserManager';

export * from './core/elements/types/element.types';
export { ElementBinding } from './core/elements/ElementBinding';
export { WebElement } from './core/elements/WebElement';
export { Button } from './core/elements/Button';
export { Textbox } from './core/elements/Textbox';
export { Combobox } from './core/elements/Combobox';
export { Checkbox } from './core/elements/Checkbox';
export { Label } from './core/elements/Label';
export { Collection, CollectionItem, ListElement } from './core/elements/Collection';
export { DynamicElement, DynamicLabel, DynamicButton, DynamicLink } from './core/elements/DynamicElement';
export type { DynamicParameter } from './core/elements/DynamicElement';
export { ElementFactory } from './core/elements/ElementFactory';
export type { ElementWrapper, ElementWrapperMap } from './core/elements/ElementFactory';

export type { PageDefinition, RawPageDefinition, RawElementDefinition, PageSummary } from './core/pages/types/page.types';
export { PageDefinitionParser } from './core/pages/PageDefinitionParser';
export { PageCache } from './core/pages/PageCache';
export { DynamicPage } from './core/pages/DynamicPage';
export { DynamicPageFactory } from './core/pages/DynamicPageFactory';
export type { LoadableSource, PageFactoryOptions } from './core/pages/DynamicPageFactory';
export { PageRegistry } from './core/pages/PageRegistry';

export { tryInOrder, tryInOrderWithResult } from './core/healing/FallbackChain';
export type { Candidate, LabeledCandidate, ChainResult } from './core/healing/FallbackChain';
export { retry, withRetry } from './core/healing/RetryHelper';
export type { RetryOptions } from './core/healing/RetryHelper';
export { ResilientElement } from './core/healing/ResilientElement';

export { DateTokenResolver, formatDate, addDays, addMonths } from './data/transformers/DateTokenResolver';
export type { Clock } from './data/transformers/DateTokenResolver';
export { TestDataResolver } from './data/provider/TestDataResolver';
export type { JsonObject, JsonValue, TestCaseData } from './data/types/data.types';
