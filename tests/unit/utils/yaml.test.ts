/**
 * Tests for YAML utilities.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { z } from 'zod';
import { loadYamlWithSchema, parseYaml, parseYamlWithSchema } from '../../../src/utils/yaml.js';
import { SystemError, ErrorCodes } from '../../../src/utils/errors.js';

const PersonSchema = z.object({ name: z.string(), age: z.number().default(0) });

describe('parseYaml', () => {
  it('should parse mappings and lists', () => {
    expect(parseYaml('name: a\nitems:\n  - 1\n  - two\n')).toEqual({ name: 'a', items: [1, 'two'] });
  });

  it('should throw SystemError for invalid YAML', () => {
    try {
      parseYaml('a: [1, 2');
      expect.fail('Should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(SystemError);
      expect((error as SystemError).code).toBe(ErrorCodes.PARSE_ERROR);
      expect((error as SystemError).message).toMatch(/^Failed to parse YAML: /);
    }
  });
});

describe('parseYamlWithSchema', () => {
  it('should apply schema defaults', () => {
    expect(parseYamlWithSchema('name: Ann', PersonSchema)).toEqual({ name: 'Ann', age: 0 });
  });

  it('should report the failing path', () => {
    try {
      parseYamlWithSchema('name: 3', PersonSchema);
      expect.fail('Should have thrown');
    } catch (error) {
      expect((error as SystemError).code).toBe(ErrorCodes.SCHEMA_ERROR);
      expect((error as SystemError).message).toMatch(/^YAML validation failed: name: /);
    }
  });
});

describe('loading files', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = join(tmpdir(), `blueprint-yaml-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await mkdir(testDir, { recursive: true });
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it('should load and validate a file', async () => {
    const file = join(testDir, 'a.yaml');
    await writeFile(file, 'name: Ann\n');

    expect(await loadYamlWithSchema(file, PersonSchema)).toEqual({ name: 'Ann', age: 0 });
  });

  it('should report a missing file', async () => {
    const file = join(testDir, 'missing.yaml');

    await expect(loadYamlWithSchema(file, PersonSchema)).rejects.toThrow(`Failed to load YAML file: ${file}`);
  });

  it('should add the file path to schema errors', async () => {
    const file = join(testDir, 'person.yaml');
    await writeFile(file, 'age: 4\n');

    await expect(loadYamlWithSchema(file, PersonSchema)).rejects.toThrow(`(file: ${file})`);
  });
});
