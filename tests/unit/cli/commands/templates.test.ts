/**
 * Tests for the templates command.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdirSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { createTemplatesCommand } from '../../../../src/cli/commands/templates.js';

const { mockLogger } = vi.hoisted(() => ({
  mockLogger: {
    error: vi.fn(),
    warn: vi.fn(),
    info: vi.fn(),
    success: vi.fn(),
    debug: vi.fn(),
  },
}));

vi.mock('../../../../src/utils/logger.js', () => ({ logger: mockLogger }));

vi.mock('chalk', () => ({
  default: {
    bold: (s: string) => s,
    cyan: (s: string) => s,
    dim: (s: string) => s,
  },
}));

describe('templates command', () => {
  let tempDir: string;
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    vi.clearAllMocks();
    tempDir = join(tmpdir(), `blueprint-templates-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    mkdirSync(join(tempDir, '.blueprint'), { recursive: true });
    vi.spyOn(process, 'cwd').mockReturnValue(tempDir);
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('should list project and built-in templates', async () => {
    mkdirSync(join(tempDir, '.blueprint/templates/entity'), { recursive: true });
    writeFileSync(join(tempDir, '.blueprint/templates/entity/template.yaml'), 'modelName: entity\n');
    mkdirSync(join(tempDir, '.blueprint/templates/notes'), { recursive: true });

    await createTemplatesCommand().parseAsync(['node', 'test']);

    expect(consoleLogSpy.mock.calls).toEqual([['Available templates:'], ['  entity'], ['  project']]);
  });

  it('should show where it searched when nothing is found', async () => {
    writeFileSync(join(tempDir, '.blueprint/config.yaml'), 'templates:\n  include_builtin: false\n');

    await createTemplatesCommand().parseAsync(['node', 'test']);

    expect(mockLogger.warn).toHaveBeenCalledWith('No templates found');
    expect(consoleLogSpy.mock.calls).toEqual([['Searched:'], [`  ${join(tempDir, '.blueprint/templates')}`]]);
  });
});
