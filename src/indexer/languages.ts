import * as path from 'node:path';
import type { Language } from '../types.js';

const EXTENSION_LANGUAGES: Record<string, Language> = {
  '.swift': 'swift',
  '.kt': 'kotlin',
  '.kts': 'kotlin',
  '.java': 'java',
  '.dart': 'dart',
  '.ts': 'javascript',
  '.tsx': 'javascript',
  '.js': 'javascript',
  '.jsx': 'javascript',
  '.mjs': 'javascript',
  '.m': 'objc',
  '.mm': 'objc',
  '.h': 'objc',
};

export const DEFAULT_EXTENSIONS = ['swift', 'kt', 'kts', 'java', 'dart', 'ts', 'tsx', 'js', 'jsx', 'm', 'mm'];

export function languageForPath(filePath: string): Language | undefined {
  return EXTENSION_LANGUAGES[path.extname(filePath).toLowerCase()];
}
