/**
 * Library entry: wires the store, provider, step engine and orchestrator.
 */
import { RoutedGenerationProvider } from './ai/provider.js';
import { Orchestrator } from './core/orchestrator.js';
import { StepEngine } from './core/steps.js';
import type { ChatRequest, ChatResponse, GenerationProvider } from './core/types.js';
import { createStore, type ConversationStore } from './db/store.js';

export interface App {
  store: ConversationStore;
  orchestrator: Orchestrator;
  handleChat(request: ChatRequest): Promise<ChatResponse>;
  close(): Promise<void>;
}

export interface AppOptions {
  store?: ConversationStore;
  provider?: GenerationProvider;
}

export async function createApp(options: AppOptions = {}): Promise<App> {
  const store = options.store ?? await createStore();
  const engine = new StepEngine(options.provider ?? new RoutedGenerationProvider());
  const orchestrator = new Orchestrator({ store, engine });
  return {
    store,
    orchestrator,
    handleChat: (request) => orchestrator.handleChat(request),
    close: () => store.close(),
  };
}

export { Orchestrator } from './core/orchestrator.js';
export { StepEngine } from './core/steps.js';
export { RoutedGenerationProvider } from './ai/provider.js';
export type * from './core/types.js';
export type { ConversationStore } from './db/store.js';
