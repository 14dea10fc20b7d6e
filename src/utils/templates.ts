import { readFile } from 'node:fs/promises';
import { join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const templatesDir = join(__dirname, '../templates');
const dataDir = join(__dirname, '../data');

export async function loadTemplate(name: string): Promise<string> {
  const filePath = join(templatesDir, name);
  const content = await readFile(filePath, 'utf8');
  return content.trim();
}

export async function loadDataFile(name: string): Promise<unknown> {
  const filePath = join(dataDir, name);
  const parsed: unknown = JSON.parse(await readFile(filePath, 'utf8'));
  return parsed;
}
