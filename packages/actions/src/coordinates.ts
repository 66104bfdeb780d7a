import { ActionError, ReasonCodes, Result, selectorKey, type ActionHandler, type Selector } from '@deskpilot/core';
import type { DesktopBackend, MouseButton, Point } from './backends';
import { basisSchema, buttonSchema, defineAction } from './define-action';

export type CoordinateBasis = 'Element' | 'Window' | 'Screen';

/**
 * A point expressed against a basis, together with its screen position.
 */
export interface Coordinate {
  x: number;
  y: number;
  screenX: number;
  screenY: number;
  basis: CoordinateBasis;
  dpi: number;
}

/**
 * Top-left corner of the basis in screen space. Element and Window bases
 * need a selector that resolves to on-screen bounds.
 */
export async function resolveOrigin(
  desktop: DesktopBackend,
  basis: CoordinateBasis,
  selector: Selector | undefined
): Promise<Point> {
  if (basis === 'Screen') return { x: 0, y: 0 };

  if (selector === undefined || selector === '') {
    throw new ActionError(ReasonCodes.InvalidParams, `Basis "${basis}" requires a selector`);
  }

  const bounds = basis === 'Element' ? await desktop.elementBounds(selector) : await desktop.windowBounds(selector);
  if (!bounds) {
    throw new ActionError(ReasonCodes.NotFound, `No ${basis.toLowerCase()} matches ${selectorKey(selector)}`, {
      selector,
    });
  }
  return { x: bounds.x, y: bounds.y };
}

/** Relative point -> coordinate */
export function fromRelative(point: Point, origin: Point, basis: CoordinateBasis, dpi: number): Coordinate {
  return { x: point.x, y: point.y, screenX: origin.x + point.x, screenY: origin.y + point.y, basis, dpi };
}

/** Screen point -> coordinate */
export function fromScreen(point: Point, origin: Point, basis: CoordinateBasis, dpi: number): Coordinate {
  return { x: point.x - origin.x, y: point.y - origin.y, screenX: point.x, screenY: point.y, basis, dpi };
}

interface ClickXYParams {
  x: number;
  y: number;
  basis?: CoordinateBasis;
  button?: MouseButton;
  clicks?: number;
  preview?: boolean;
}

interface CaptureParams {
  basis?: CoordinateBasis;
  preview?: boolean;
  radius?: number;
}

export function createCoordinateActions(desktop: DesktopBackend): ActionHandler[] {
  return [
    defineAction<ClickXYParams>({
      name: 'click_xy',
      title: 'Click at coordinates',
      description: 'Click a point given relative to the element, window or screen',
      category: 'coordinates',
      paramsSchema: {
        type: 'object',
        required: ['x', 'y'],
        properties: {
          x: { type: 'number' },
          y: { type: 'number' },
          basis: basisSchema,
          button: buttonSchema,
          clicks: { type: 'integer', minimum: 1, maximum: 3, default: 1 },
          preview: { type: 'boolean', default: false },
        },
      },
      async run(params, { selector }) {
        const basis = params.basis ?? 'Screen';
        const origin = await resolveOrigin(desktop, basis, selector);
        const coordinate = fromRelative({ x: params.x, y: params.y }, origin, basis, await desktop.screenDpi());

        if (params.preview) {
          return Result.success({ ...coordinate, clicked: false });
        }

        await desktop.click(
          { x: coordinate.screenX, y: coordinate.screenY },
          { button: params.button ?? 'left', clicks: params.clicks ?? 1 }
        );
        return Result.success({ ...coordinate, clicked: true });
      },
    }),

    defineAction<CaptureParams>({
      name: 'capture_coordinates',
      title: 'Capture pointer coordinates',
      description: 'Read the pointer position relative to a basis, with a thumbnail of the area around it',
      category: 'coordinates',
      paramsSchema: {
        type: 'object',
        properties: {
          basis: basisSchema,
          preview: { type: 'boolean', default: false },
          radius: { type: 'integer', exclusiveMinimum: 0, default: 16 },
        },
      },
      async run(params, { selector }) {
        const basis = params.basis ?? 'Screen';
        const origin = await resolveOrigin(desktop, basis, selector);
        const pointer = await desktop.pointerPosition();
        const coordinate = fromScreen(pointer, origin, basis, await desktop.screenDpi());

        if (params.preview) {
          return Result.success(coordinate);
        }

        const radius = params.radius ?? 16;
        const image = await desktop.capture({
          x: pointer.x - radius,
          y: pointer.y - radius,
          width: radius * 2,
          height: radius * 2,
        });
        return Result.success({ ...coordinate, image });
      },
    }),
  ];
}
