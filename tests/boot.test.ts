import { describe, test, expect } from '@jest/globals';
import fs from 'node:fs';
import path from 'node:path';

describe('runner boot order', () => {
  test('.env is loaded before any module that reads settings at import time', () => {
    const src = fs.readFileSync(path.join(__dirname, '..', 'src', 'index.ts'), 'utf8');
    const imports = src.split('\n').filter((line) => line.startsWith('import '));
    expect(imports[0]).toBe("import 'dotenv/config';");
  });
});
