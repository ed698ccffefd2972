export type {
  AutomationSession,
  AutomationSteps,
  BrowserEnginePort,
  EngineHandle,
  NavigateOptions,
  NavigationResult,
  RowFieldSelector,
  ScreenshotOptions,
  WaitForSelectorOptions,
} from './BrowserEnginePort';
