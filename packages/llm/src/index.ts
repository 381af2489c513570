export type { IGenerativeModel } from "./generative-model.interface.js";
export { CohereChatModel } from "./cohere-model.js";
export type { CohereChatModelConfig } from "./cohere-model.js";
export { OllamaModel } from "./ollama-model.js";
export type { OllamaModelConfig } from "./ollama-model.js";
export { BreakerModel } from "./breaker-model.js";
export { createGenerativeModel } from "./factory.js";
export type { GenerativeModelFactoryConfig } from "./factory.js";
