import type { ActionHandler } from '@deskpilot/core';
import type { ActionBackends } from './backends';
import { createWebActions } from './web';
import { createImageActions } from './image';
import { createCoordinateActions } from './coordinates';
import { createTableActions } from './table';
import { createUtilityActions } from './utility';

/**
 * Built-in actions for the backends a host provides. Families without a
 * backend are left out, so they are neither listed nor resolvable.
 *
 * ```typescript
 * registry.registerAll(createBuiltinActions({ browser, tables }));
 * ```
 */
export function createBuiltinActions(backends: ActionBackends = {}): ActionHandler[] {
  const actions: ActionHandler[] = [];
  if (backends.browser) actions.push(...createWebActions(backends.browser));
  if (backends.images && backends.desktop) actions.push(...createImageActions(backends.images, backends.desktop));
  if (backends.desktop) actions.push(...createCoordinateActions(backends.desktop));
  if (backends.tables) actions.push(...createTableActions(backends.tables));
  actions.push(...createUtilityActions());
  return actions;
}

export type {
  ActionBackends,
  BrowserBackend,
  DesktopBackend,
  ImageMatcher,
  ImageMatch,
  ImageMatchOptions,
  TableBackend,
  TableRow,
  Point,
  Region,
  ElementState,
  DownloadResult,
  MouseButton,
} from './backends';
export { defineAction, withTimeout, TIMED_OUT, type ActionDefinition } from './define-action';
export { createWebActions, DEFAULT_WEB_TIMEOUT_MS } from './web';
export { createImageActions, DEFAULT_TOLERANCE, DEFAULT_TEMPLATE_DPI } from './image';
export {
  createCoordinateActions,
  resolveOrigin,
  fromRelative,
  fromScreen,
  type Coordinate,
  type CoordinateBasis,
} from './coordinates';
export { createTableActions, parseRowQuery, rowMatches, type RowCriteria } from './table';
export { createUtilityActions } from './utility';
