export { ModelRegistry } from "./model-registry.js";
