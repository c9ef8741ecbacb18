import type { ElementLocator } from './locator.js';
import type { WorkflowState } from './workflow.js';

export type FieldKind = 'text' | 'radio' | 'dropdown' | 'click';

export type ScreenState = Exclude<WorkflowState, 'Confirmation' | 'Success' | 'Failure'>;

export interface FieldCondition {
  key: string;
  equals?: string;
  in?: string[];
  present?: boolean;
}

export interface FieldBinding {
  key: string;
  label: string;
  kind: FieldKind;
  locator?: ElementLocator;
  /** radio/click choices, keyed by the form value they represent */
  options?: Record<string, ElementLocator>;
  required?: boolean;
  when?: FieldCondition;
}

export interface ScreenDefinition {
  state: ScreenState;
  fields: FieldBinding[];
  continue: ElementLocator;
  checkpoint?: boolean;
}

export interface BoilerplateSets {
  terminalRejection: string[];
  validationError: string[];
}

export interface ReferenceRules {
  markers: string[];
  pattern: string;
  panelSelector: string;
  itemSelector: string;
}

export interface DiagnosticRules {
  panelSelectors: string[];
  itemSelector: string;
  ignoredHeaders: string[];
  patterns: string[];
  sentinelMessage: string;
}

export interface CompletionRules {
  labels: string[];
  pattern: string;
  separator: string;
  documentLocator: ElementLocator;
}

export interface SiteProfile {
  name: string;
  startUrl: string;
  screens: ScreenDefinition[];
  boilerplate: BoilerplateSets;
  reference: ReferenceRules;
  diagnostics: DiagnosticRules;
  completion: CompletionRules;
}
