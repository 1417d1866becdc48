import 'reflect-metadata';
import { mkdtempSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';

process.env.NODE_ENV = 'test';
process.env.API_TOKEN = 'test-secret';
process.env.BATCH_DELAY_MS = '0';
process.env.OUTPUT_DIR = mkdtempSync(join(tmpdir(), 'page-harvest-'));
