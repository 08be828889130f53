/**
 * Tests for the generate command.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { createGenerateCommand } from '../../../../src/cli/commands/generate.js';

const { replies, mockLogger } = vi.hoisted(() => {
  const replies: string[] = [];
  const mockLogger = {
    error: vi.fn(),
    warn: vi.fn(),
    info: vi.fn(),
    success: vi.fn(),
    debug: vi.fn(),
    setLevel: vi.fn(),
    child: vi.fn(),
  };
  mockLogger.child.mockReturnValue(mockLogger);
  return { replies, mockLogger };
});

vi.mock('../../../../src/utils/logger.js', () => ({ logger: mockLogger }));

vi.mock('chalk', () => ({
  default: {
    bold: (s: string) => s,
    cyan: (s: string) => s,
    dim: (s: string) => s,
    yellow: (s: string) => s,
  },
}));

vi.mock('node:readline', () => ({
  createInterface: vi.fn(() => ({
    question: (_prompt: string, answer: (reply: string) => void) => answer(replies.shift() ?? ''),
    once: vi.fn(),
    off: vi.fn(),
    close: vi.fn(),
  })),
}));

const ENTITY_TEMPLATE = `modelName: entity
questions:
  - plain: { name: entityName, caption: Entity name }
  - options:
      name: idType
      caption: Identifier type
      options:
        - option: UUID
        - option: Long
operations:
  - transform: { src: Entity.txt, dst: "src/\${entity.entityName}.txt" }
  - copy: { src: Entity.txt, dst: raw/Entity.txt }
`;

describe('generate command', () => {
  let tempDir: string;
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    vi.clearAllMocks();
    mockLogger.child.mockReturnValue(mockLogger);
    replies.length = 0;
    tempDir = join(tmpdir(), `blueprint-generate-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    const templateDir = join(tempDir, '.blueprint/templates/entity');
    mkdirSync(templateDir, { recursive: true });
    writeFileSync(join(templateDir, 'template.yaml'), ENTITY_TEMPLATE);
    writeFileSync(join(templateDir, 'Entity.txt'), 'entity ${entityName} id ${entity.idType}\n');
    vi.spyOn(process, 'cwd').mockReturnValue(tempDir);
    vi.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('process.exit called');
    });
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('should be available as gen', () => {
    const command = createGenerateCommand();

    expect(command.name()).toBe('generate');
    expect(command.aliases()).toEqual(['gen']);
    expect(command.options.map((opt) => opt.long)).toEqual(['--output', '--dry-run', '--verbose']);
  });

  it('should ask the template questions and run its operations', async () => {
    replies.push('Order', '', '2');

    await createGenerateCommand().parseAsync(['node', 'test', 'entity', '-o', 'out']);

    expect(readFileSync(join(tempDir, 'out/src/Order.txt'), 'utf-8')).toBe('entity Order id 2\n');
    expect(readFileSync(join(tempDir, 'out/raw/Entity.txt'), 'utf-8')).toBe('entity ${entityName} id ${entity.idType}\n');
    expect(consoleLogSpy).toHaveBeenCalledWith('Template entity');
    expect(consoleLogSpy).toHaveBeenCalledWith('  Input 1-2');
    expect(mockLogger.success.mock.calls).toEqual([
      ['Created src/Order.txt (transform)'],
      ['Created raw/Entity.txt (copy)'],
    ]);
  });

  it('should switch to debug logging with --verbose', async () => {
    replies.push('Order', '1');

    await createGenerateCommand().parseAsync(['node', 'test', 'entity', '--verbose', '--dry-run']);

    expect(mockLogger.setLevel).toHaveBeenCalledWith('debug');
    expect(existsSync(join(tempDir, 'src'))).toBe(false);
  });

  it('should fail for an unknown template', async () => {
    await expect(
      createGenerateCommand().parseAsync(['node', 'test', 'missing'])
    ).rejects.toThrow('process.exit called');

    expect(mockLogger.error).toHaveBeenCalledWith(
      'Unable to find template.yaml for template missing',
      expect.any(Error)
    );
  });

  it('should refuse template names that leave the search path', async () => {
    await expect(
      createGenerateCommand().parseAsync(['node', 'test', '../entity'])
    ).rejects.toThrow('process.exit called');

    expect(mockLogger.error).toHaveBeenCalledWith('Invalid template name: ../entity', expect.any(Error));
  });
});
