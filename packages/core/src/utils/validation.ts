import type { ActionStep, ControlStep, Flow, Step } from '../types/flow';
import { FLOW_OPERATIONS } from '../types/flow';
import type { ValidationIssue } from '../types/errors';
import { isSafePath } from './id';

interface Walk {
  readonly issues: ValidationIssue[];
  readonly seen: Set<string>;
}

function error(walk: Walk, path: string, message: string): void {
  walk.issues.push({ path, message, severity: 'error' });
}

function validateActionStep(step: ActionStep, path: string, walk: Walk): void {
  if (!step.action) error(walk, `${path}.action`, 'Required');
  if (step.out !== undefined && !isSafePath(step.out)) {
    error(walk, `${path}.out`, `Invalid variable name "${step.out}"`);
  }
  if (step.retry !== undefined && (!Number.isInteger(step.retry) || step.retry < 0)) {
    error(walk, `${path}.retry`, 'Must be a non-negative integer');
  }
  if (step.timeoutMs !== undefined && step.timeoutMs <= 0) {
    error(walk, `${path}.timeoutMs`, 'Must be positive');
  }
  if (step.onError?.recover) {
    validateStep(step.onError.recover, `${path}.onError.recover`, walk, false);
  }
}

function validateControlStep(step: ControlStep, path: string, walk: Walk, inLoop: boolean): void {
  const block = step.control;
  switch (block.type) {
    case 'break':
    case 'continue':
      if (!inLoop) error(walk, path, `"${block.type}" outside a loop`);
      return;
    case 'if':
      validateSteps(block.then, `${path}.then`, walk, inLoop);
      validateSteps(block.else ?? [], `${path}.else`, walk, inLoop);
      return;
    case 'while':
      if (block.maxIterations !== undefined && (!Number.isInteger(block.maxIterations) || block.maxIterations < 1)) {
        error(walk, `${path}.maxIterations`, 'Must be a positive integer');
      }
      validateSteps(block.body, `${path}.body`, walk, true);
      return;
    case 'for_each':
      if (block.as !== undefined && (!isSafePath(block.as) || block.as.includes('.'))) {
        error(walk, `${path}.as`, `Invalid variable name "${block.as}"`);
      }
      validateSteps(block.body, `${path}.body`, walk, true);
      return;
    case 'try':
      validateSteps(block.body, `${path}.body`, walk, inLoop);
      validateSteps(block.catch ?? [], `${path}.catch`, walk, inLoop);
      validateSteps(block.finally ?? [], `${path}.finally`, walk, inLoop);
      return;
    case 'switch':
      if (!isSafePath(block.value)) error(walk, `${path}.value`, `Invalid variable name "${block.value}"`);
      block.cases.forEach((c, i) => validateSteps(c.steps, `${path}.cases.${i}.steps`, walk, inLoop));
      validateSteps(block.default ?? [], `${path}.default`, walk, inLoop);
      return;
    case 'subflow':
      if (!block.flowId) error(walk, `${path}.flowId`, 'Required');
      if (block.out !== undefined && !isSafePath(block.out)) {
        error(walk, `${path}.out`, `Invalid variable name "${block.out}"`);
      }
      return;
  }
}

function validateStep(step: Step, path: string, walk: Walk, inLoop: boolean): void {
  if (!step.id) {
    error(walk, `${path}.id`, 'Required');
  } else if (walk.seen.has(step.id)) {
    error(walk, `${path}.id`, `Duplicate step id "${step.id}"`);
  }
  walk.seen.add(step.id);

  if (step.control) validateControlStep(step, path, walk, inLoop);
  else validateActionStep(step, path, walk);
}

function validateSteps(steps: readonly Step[], path: string, walk: Walk, inLoop: boolean): void {
  steps.forEach((step, index) => validateStep(step, `${path}.${index}`, walk, inLoop));
}

export function validateFlow(flow: Flow): ValidationIssue[] {
  const walk: Walk = { issues: [], seen: new Set() };
  const { issues } = walk;

  if (!flow.id) issues.push({ path: 'id', message: 'Required', severity: 'error' });
  if (!flow.version) issues.push({ path: 'version', message: 'Required', severity: 'error' });
  if (!flow.name) issues.push({ path: 'name', message: 'Required', severity: 'error' });

  if (flow.steps.length === 0) {
    issues.push({ path: 'steps', message: 'At least one step required', severity: 'warning' });
  }

  validateSteps(flow.steps, 'steps', walk, false);

  if (flow.defaults?.timeoutMs !== undefined && flow.defaults.timeoutMs <= 0) {
    issues.push({ path: 'defaults.timeoutMs', message: 'Must be positive', severity: 'error' });
  }

  for (const key of Object.keys(flow.roles)) {
    if (!FLOW_OPERATIONS.some(op => op === key)) {
      issues.push({ path: `roles.${key}`, message: `Unknown operation "${key}"`, severity: 'warning' });
    }
  }

  return issues;
}
