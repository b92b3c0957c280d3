export { defaultSearchPath, defaultTemplates } from './defaults.js';
export { SearchPathRegistry } from './registry.js';
export { SearchPathTemplate, TEMPLATE_SLOT } from './template.js';
