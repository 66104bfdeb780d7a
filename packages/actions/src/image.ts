import { ReasonCodes, Result, type ActionHandler } from '@deskpilot/core';
import type { DesktopBackend, ImageMatcher, MouseButton, Region } from './backends';
import { fromScreen, resolveOrigin, type CoordinateBasis } from './coordinates';
import { basisSchema, buttonSchema, defineAction, regionSchema } from './define-action';

export const DEFAULT_TOLERANCE = 0.1;
export const DEFAULT_TEMPLATE_DPI = 96;

interface FindImageParams {
  template: string;
  scale?: number;
  tolerance?: number;
  dpi?: number;
  region?: Region;
  basis?: CoordinateBasis;
  button?: MouseButton;
  preview?: boolean;
}

export function createImageActions(images: ImageMatcher, desktop: DesktopBackend): ActionHandler[] {
  return [
    defineAction<FindImageParams>({
      name: 'find_image',
      title: 'Find image',
      description: 'Locate a template image on screen and click its centre; preview only reports it',
      category: 'image',
      paramsSchema: {
        type: 'object',
        required: ['template'],
        properties: {
          template: { type: 'string', minLength: 1 },
          scale: { type: 'number', exclusiveMinimum: 0, default: 1 },
          tolerance: { type: 'number', minimum: 0, maximum: 1, default: DEFAULT_TOLERANCE },
          dpi: { type: 'number', exclusiveMinimum: 0, default: DEFAULT_TEMPLATE_DPI },
          region: regionSchema,
          basis: basisSchema,
          button: buttonSchema,
          preview: { type: 'boolean', default: false },
        },
      },
      async run(params, { selector }) {
        const basis = params.basis ?? 'Screen';
        const origin = await resolveOrigin(desktop, basis, selector);
        const tolerance = params.tolerance ?? DEFAULT_TOLERANCE;

        const match = await images.find(params.template, {
          scale: params.scale ?? 1,
          tolerance,
          dpi: params.dpi ?? DEFAULT_TEMPLATE_DPI,
          region: params.region,
        });
        if (!match) {
          return Result.failure(ReasonCodes.NotFound, `Image "${params.template}" not found on screen`, {
            template: params.template,
            tolerance,
          });
        }

        const centre = { x: match.x + Math.round(match.width / 2), y: match.y + Math.round(match.height / 2) };
        const coordinate = fromScreen(centre, origin, basis, await desktop.screenDpi());
        const output = { ...coordinate, confidence: match.confidence, bounds: match };

        if (params.preview) {
          return Result.success({ ...output, clicked: false });
        }

        await desktop.click(centre, { button: params.button ?? 'left', clicks: 1 });
        return Result.success({ ...output, clicked: true });
      },
    }),
  ];
}
