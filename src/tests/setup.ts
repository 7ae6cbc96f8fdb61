import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

const PROVIDER_KEYS = ['OPENAI_API_KEY', 'ANTHROPIC_API_KEY', 'GOOGLE_API_KEY', 'LOCAL_MODEL_PATH', 'LLM_PROVIDER'] as const;

const emptyDotenvPath = path.join(os.tmpdir(), 'loremaze-vitest-empty.env');
if (!fs.existsSync(emptyDotenvPath)) {
  fs.writeFileSync(emptyDotenvPath, '', 'utf8');
}

process.env.DOTENV_CONFIG_PATH = emptyDotenvPath;
process.env.DOTENV_CONFIG_OVERRIDE = 'false';

for (const key of PROVIDER_KEYS) {
  if (process.env[key] !== undefined) {
    delete process.env[key];
  }
}

process.env.NODE_ENV = 'test';
