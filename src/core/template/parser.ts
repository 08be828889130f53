/**
 * Template description parsing.
 *
 * `template.yaml` holds a `modelName`, a `questions` list and an `operations`
 * list. Every list entry is a mapping with a single key, its tag:
 *
 * ```yaml
 * modelName: entity
 * questions:
 *   - plain: { name: entityName, caption: Entity name }
 *   - options:
 *       name: idType
 *       caption: Identifier type
 *       options:
 *         - option: UUID
 *         - option: Long
 * operations:
 *   - transform: { src: Entity.java, dst: "src/${entity.entityName}.java" }
 *   - copy: { src: logo.png, dst: assets/logo.png }
 * ```
 *
 * Unknown tags and missing attributes reject the whole document.
 */
import * as path from 'node:path';
import { z } from 'zod';
import { ErrorCodes, SystemError, TemplateError } from '../../utils/errors.js';
import { fileExists, readFile } from '../../utils/file-system.js';
import { formatZodError, parseYaml } from '../../utils/yaml.js';
import { TEMPLATE_FILE, type TemplateLocator } from './locator.js';
import type { GenerationInstruction, Template, TemplateQuestion } from './types.js';

const EntrySchema = z.record(z.string(), z.unknown());

function listOf<T extends z.ZodType>(schema: T) {
  return z.preprocess((val) => val ?? [], z.array(schema));
}

// Unknown keys are rejected so a misspelled region cannot pass as an empty one.
const TemplateDocumentSchema = z.object({
  modelName: z.string().min(1),
  questions: listOf(EntrySchema),
  operations: listOf(EntrySchema),
}).strict();

const QuestionAttributesSchema = z.object({
  name: z.string().min(1),
  caption: z.string(),
}).strict();

const OptionsAttributesSchema = QuestionAttributesSchema.extend({
  options: z.array(EntrySchema).min(1),
}).strict();

const InstructionAttributesSchema = z.object({
  src: z.string().min(1),
  dst: z.string().min(1),
}).strict();

type Entry = z.infer<typeof EntrySchema>;

/**
 * Parses one template. Reading goes through `locator`, so the same parser
 * serves project, user and built-in templates.
 */
export async function parseTemplate(templateId: string, locator: TemplateLocator): Promise<Template> {
  const basePath = await locator.locate(templateId);
  const descriptionPath = path.join(basePath, TEMPLATE_FILE);

  if (!(await fileExists(descriptionPath))) {
    throw new TemplateError(
      ErrorCodes.TEMPLATE_NOT_FOUND,
      `Unable to find ${TEMPLATE_FILE} for template ${templateId}`,
      { templateId, path: descriptionPath }
    );
  }

  return parseTemplateDocument(templateId, basePath, await readFile(descriptionPath));
}

/**
 * Parses the text of a template description whose files live in `basePath`.
 */
export function parseTemplateDocument(templateId: string, basePath: string, content: string): Template {
  const parser = new DocumentParser(templateId);
  const document = parser.attributes(TemplateDocumentSchema, parser.yaml(content), 'template');

  return {
    path: basePath,
    modelName: document.modelName,
    questions: document.questions.map((entry) => parser.question(entry)),
    instructions: document.operations.map((entry) => parser.instruction(entry)),
  };
}

class DocumentParser {
  constructor(private readonly templateId: string) {}

  yaml(content: string): unknown {
    try {
      return parseYaml(content);
    } catch (error) {
      if (error instanceof SystemError) {
        throw this.invalid(error.message);
      }
      throw error;
    }
  }

  question(entry: Entry): TemplateQuestion {
    const [tag, body] = this.tagged(entry, 'questions');
    switch (tag) {
      case 'plain': {
        const { name, caption } = this.attributes(QuestionAttributesSchema, body, 'plain');
        return { kind: 'plain', name, caption };
      }
      case 'options': {
        const { name, caption, options } = this.attributes(OptionsAttributesSchema, body, 'options');
        return { kind: 'options', name, caption, options: options.map((option) => this.option(option)) };
      }
      default:
        throw this.invalid(`unknown question tag '${tag}'`);
    }
  }

  instruction(entry: Entry): GenerationInstruction {
    const [tag, body] = this.tagged(entry, 'operations');
    switch (tag) {
      case 'transform':
      case 'copy': {
        const { src, dst } = this.attributes(InstructionAttributesSchema, body, tag);
        return { src, dst, transform: tag === 'transform' };
      }
      default:
        throw this.invalid(`unknown operation tag '${tag}'`);
    }
  }

  attributes<T extends z.ZodType>(schema: T, value: unknown, where: string): z.infer<T> {
    const result = schema.safeParse(value);
    if (!result.success) {
      throw this.invalid(`${where}: ${formatZodError(result.error)}`);
    }
    return result.data;
  }

  private option(entry: Entry): string {
    const [tag, label] = this.tagged(entry, 'options');
    if (tag !== 'option') {
      throw this.invalid(`unknown option tag '${tag}'`);
    }
    if (typeof label !== 'string' && typeof label !== 'number') {
      throw this.invalid('option label must be text');
    }
    return String(label);
  }

  private tagged(entry: Entry, region: string): [string, unknown] {
    const entries = Object.entries(entry);
    const [first] = entries;
    if (entries.length !== 1 || !first) {
      throw this.invalid(`every entry in ${region} needs exactly one tag`);
    }
    return first;
  }

  private invalid(reason: string): TemplateError {
    return new TemplateError(
      ErrorCodes.INVALID_TEMPLATE,
      `Invalid template ${this.templateId}: ${reason}`,
      { templateId: this.templateId }
    );
  }
}
