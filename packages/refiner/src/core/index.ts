export { BaseLLMComponent } from './base-llm-component';
export type { BaseLLMComponentOptions } from './base-llm-component';
export { TextLLMComponent } from './text-llm-component';
