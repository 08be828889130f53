/**
 * Prints the blueprint version.
 */
import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

const PackageJsonSchema = z.object({ version: z.string() });

/** Version from the package.json next to the sources. */
export function readVersion(): string {
  const packageJsonPath = fileURLToPath(new URL('../../../package.json', import.meta.url));
  return PackageJsonSchema.parse(JSON.parse(readFileSync(packageJsonPath, 'utf-8'))).version;
}

export function createVersionCommand(): Command {
  return new Command('version')
    .description('Print the blueprint version')
    .action(() => {
      console.log(readVersion());
    });
}
