/**
 * Test Utilities Module
 *
 * Shared fakes for testing across the codebase.
 *
 * @example
 * ```typescript
 * import { KeywordIndex, ScriptedAgent, testConfig } from '../test-utils/index.js';
 *
 * const navigator = createNavigator({
 *   config: testConfig(root),
 *   handles: new PlatformHandles({ index: () => new KeywordIndex(), agent: () => agent }),
 * });
 * ```
 */

export { KeywordIndex, ScriptedAgent, testConfig } from './fakes.js';
