import { promises as fs } from 'fs';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { ConfigurationError, errorMessage } from '../errors';

export const DEFAULT_TEMPLATE_PATH = fileURLToPath(
  new URL('../../../templates/slide-template.json', import.meta.url)
);

const colorSchema = z.string().regex(/^[0-9A-Fa-f]{6}$/, 'expected a hex colour like 0C5C8F');

const textElementSchema = z.object({
  text: z.string(),
  x: z.number(),
  y: z.number(),
  w: z.number().positive(),
  h: z.number().positive(),
  fontSize: z.number().positive().default(14),
  fontFace: z.string().optional(),
  bold: z.boolean().default(false),
  italic: z.boolean().default(false),
  color: colorSchema.optional(),
  fill: colorSchema.optional(),
  align: z.enum(['left', 'center', 'right']).default('left'),
  valign: z.enum(['top', 'middle', 'bottom']).default('top'),
});

const shapeElementSchema = z.object({
  x: z.number(),
  y: z.number(),
  w: z.number().positive(),
  h: z.number().nonnegative(),
  fill: colorSchema,
});

export const slideTemplateSchema = z.object({
  name: z.string().default('default'),
  layout: z.enum(['LAYOUT_16x9', 'LAYOUT_16x10', 'LAYOUT_4x3', 'LAYOUT_WIDE']).default('LAYOUT_WIDE'),
  fontFace: z.string().default('Calibri'),
  background: colorSchema.default('FFFFFF'),
  textColor: colorSchema.default('1E2E3E'),
  shapes: z.array(shapeElementSchema).default([]),
  elements: z.array(textElementSchema).min(1),
  pageNumber: textElementSchema,
});

export type SlideTemplate = z.infer<typeof slideTemplateSchema>;
export type TextElement = z.infer<typeof textElementSchema>;
export type ShapeElement = z.infer<typeof shapeElementSchema>;

export async function loadSlideTemplate(filePath: string = DEFAULT_TEMPLATE_PATH): Promise<SlideTemplate> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read slide template ${filePath}: ${errorMessage(error)}`);
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(`Slide template ${filePath} is not valid JSON: ${errorMessage(error)}`);
  }

  const parsed = slideTemplateSchema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid slide template ${filePath}: ${issues}`);
  }
  return parsed.data;
}
