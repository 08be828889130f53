/**
 * Template model: what `template.yaml` describes once parsed.
 */

/** Question descriptor as declared by a template. No defaults or validation. */
export type TemplateQuestion =
  | { kind: 'plain'; name: string; caption: string }
  | { kind: 'options'; name: string; caption: string; options: string[] };

/**
 * One generation step. `transform` sources have their placeholders replaced
 * with answers; other sources are copied verbatim.
 */
export interface GenerationInstruction {
  src: string;
  dst: string;
  transform: boolean;
}

export interface Template {
  /** Directory holding template.yaml and the source files */
  path: string;
  /** Prefix under which answers are exposed to placeholders */
  modelName: string;
  questions: TemplateQuestion[];
  instructions: GenerationInstruction[];
}
