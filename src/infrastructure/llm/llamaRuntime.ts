// Infrastructure layer: node-llama-cpp runtime adapter
// node-llama-cpp is an optional dependency, so it is imported at run time and
// checked against the subset of its v3 API used here.

import type { LocalDirectSettings } from '@/domain/llm/types.js';

export interface LocalGenerateOptions {
  systemPrompt?: string;
  maxTokens: number;
  temperature: number;
  signal?: AbortSignal;
}

/**
 * A loaded local model.
 */
export interface LocalModelRuntime {
  generate(prompt: string, options: LocalGenerateOptions): Promise<string>;
}

export type LocalRuntimeLoader = (settings: LocalDirectSettings) => Promise<LocalModelRuntime>;

interface LlamaContextSequence {
  dispose?(): void;
}

interface LlamaContext {
  getSequence(): LlamaContextSequence;
  dispose(): Promise<void> | void;
}

interface LlamaModel {
  createContext(options: { contextSize: number }): Promise<LlamaContext>;
}

interface Llama {
  loadModel(options: { modelPath: string }): Promise<LlamaModel>;
}

interface LlamaChatSession {
  prompt(
    text: string,
    options: { maxTokens: number; temperature: number; signal?: AbortSignal }
  ): Promise<string>;
}

interface LlamaModule {
  /** `build: 'never'` keeps a missing prebuilt binary from triggering a source download */
  getLlama(options: { build: 'never' }): Promise<Llama>;
  LlamaChatSession: new (options: {
    contextSequence: LlamaContextSequence;
    systemPrompt?: string;
  }) => LlamaChatSession;
}

function isLlamaModule(value: unknown): value is LlamaModule {
  return (
    typeof value === 'object' &&
    value !== null &&
    'getLlama' in value &&
    typeof value.getLlama === 'function' &&
    'LlamaChatSession' in value &&
    typeof value.LlamaChatSession === 'function'
  );
}

const MODULE_NAME = 'node-llama-cpp';

export class RuntimeUnavailableError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'RuntimeUnavailableError';
  }
}

export type ModuleImporter = (specifier: string) => Promise<unknown>;

const importModule: ModuleImporter = (specifier) => import(specifier);

/**
 * Build a loader that reads the model file once; every generate call gets a
 * fresh context.
 */
export function createLlamaRuntimeLoader(importer: ModuleImporter = importModule): LocalRuntimeLoader {
  return async (settings) => {
    let imported: unknown;
    try {
      imported = await importer(MODULE_NAME);
    } catch (error) {
      throw new RuntimeUnavailableError(`${MODULE_NAME} is not installed`, { cause: error });
    }
    if (!isLlamaModule(imported)) {
      throw new RuntimeUnavailableError(`${MODULE_NAME} does not expose the expected API`);
    }
    return loadModel(imported, settings);
  };
}

export const loadLlamaRuntime: LocalRuntimeLoader = createLlamaRuntimeLoader();

async function loadModel(llamaModule: LlamaModule, settings: LocalDirectSettings): Promise<LocalModelRuntime> {
  let llama: Llama;
  try {
    llama = await llamaModule.getLlama({ build: 'never' });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new RuntimeUnavailableError(`No prebuilt llama.cpp binary for this platform: ${message}`, { cause: error });
  }
  const model = await llama.loadModel({ modelPath: settings.modelPath });
  console.log(`[LocalDirect] Loaded model ${settings.modelPath}`);

  return {
    async generate(prompt, options) {
      const context = await model.createContext({ contextSize: settings.contextSize });
      try {
        const session = new llamaModule.LlamaChatSession({
          contextSequence: context.getSequence(),
          systemPrompt: options.systemPrompt,
        });
        return await session.prompt(prompt, {
          maxTokens: options.maxTokens,
          temperature: options.temperature,
          signal: options.signal,
        });
      } finally {
        await context.dispose();
      }
    },
  };
}
