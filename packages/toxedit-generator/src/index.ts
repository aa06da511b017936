export * from "./processor/collaborators.js";
export * from "./processor/form-extraction.js";
export * from "./processor/heuristic-form-extractor.js";
export * from "./processor/json-output.js";
export * from "./processor/llm-client.js";
export * from "./processor/openai-edit-generator.js";
export * from "./processor/openai-form-extractor.js";
export * from "./processor/unavailable-generator.js";
