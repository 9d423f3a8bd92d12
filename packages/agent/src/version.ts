import { readFileSync } from 'node:fs';
import { z } from 'zod';

const PackageJson = z.object({ version: z.string() });

const raw = readFileSync(new URL('../package.json', import.meta.url), 'utf-8');

export const VERSION: string = PackageJson.parse(JSON.parse(raw)).version;
