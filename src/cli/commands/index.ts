/**
 * CLI Commands - Public API
 */

export { executeRenderCommand, type RenderCommandDeps } from './render.js';
export { executeInspectCommand, describeLimit, type InspectCommandDeps } from './inspect.js';
export { parseRenderArgs, parseSourceArgs, type RenderArgs, type SourceArgs } from './options.js';
