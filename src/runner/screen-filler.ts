import type { FieldBinding, FieldCondition, ScreenDefinition } from '../types/index.js';
import type { FormValues } from '../form/form-values.js';
import type { Interactor } from '../interaction/interactor.js';
import { InteractionFailure } from '../exception/errors.js';
import type { EventLogger } from '../logging/run-logger.js';

export interface FieldOutcome {
  key: string;
  kind: FieldBinding['kind'];
  applied: boolean;
}

export function conditionHolds(condition: FieldCondition | undefined, values: FormValues): boolean {
  if (!condition) return true;
  const value = values[condition.key];
  if (condition.present !== undefined && (value !== undefined) !== condition.present) return false;
  if (condition.equals !== undefined && value !== condition.equals) return false;
  if (condition.in !== undefined && (value === undefined || !condition.in.includes(value))) return false;
  return true;
}

function missing(field: FieldBinding, reason: string): InteractionFailure {
  const action = field.kind === 'text' ? 'fill' : field.kind;
  return new InteractionFailure(`${field.label}: ${reason}`, action, field.label);
}

async function applyField(field: FieldBinding, values: FormValues, interactor: Interactor): Promise<boolean> {
  const value = values[field.key];
  const opts = { required: field.required, label: field.label };

  if (field.kind === 'click') {
    const target = (value !== undefined ? field.options?.[value] : undefined) ?? field.locator;
    if (!target) throw missing(field, 'no control to click');
    return interactor.click(target, opts);
  }

  if (value === undefined) {
    if (field.required) throw missing(field, 'no value to enter');
    return false;
  }

  switch (field.kind) {
    case 'text': {
      if (!field.locator) throw missing(field, 'no locator');
      return interactor.fill(field.locator, value, opts);
    }
    case 'dropdown': {
      if (!field.locator) throw missing(field, 'no locator');
      return interactor.selectDropdown(field.locator, value, opts);
    }
    case 'radio': {
      const target = field.options?.[value] ?? field.locator;
      if (!target) {
        if (field.required) throw missing(field, `no choice for "${value}"`);
        return false;
      }
      return interactor.selectRadio(target, opts);
    }
  }
}

/** Fill every field of a screen whose condition holds, in declaration order. */
export async function fillScreen(
  screen: ScreenDefinition,
  values: FormValues,
  interactor: Interactor,
  logger: EventLogger,
): Promise<FieldOutcome[]> {
  const outcomes: FieldOutcome[] = [];
  for (const field of screen.fields) {
    if (!conditionHolds(field.when, values)) continue;
    const applied = await applyField(field, values, interactor);
    outcomes.push({ key: field.key, kind: field.kind, applied });
  }
  await logger.log('info', 'screen_filled', {
    state: screen.state,
    applied: outcomes.filter((o) => o.applied).map((o) => o.key),
    skipped: outcomes.filter((o) => !o.applied).map((o) => o.key),
  });
  return outcomes;
}
