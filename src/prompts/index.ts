/**
 * Prompt templates for generation backends. A non-empty override replaces the default.
 */

import * as fs from 'fs';
import * as path from 'path';
import { ConfigError, errorMessage } from '../errors';
import { BUILD_MODULE_TEMPLATE } from './build_module';
import { getBuildSystemPrompt } from './build_system';

export { BUILD_MODULE_TEMPLATE, getBuildSystemPrompt };

/** Read a template override given as a path relative to `root`; null when unset. */
export function loadPromptOverride(root: string, override: string): string | null {
    if (!override.trim()) return null;
    const p = path.resolve(root, override);
    try {
        return fs.readFileSync(p, 'utf8');
    } catch (e) {
        throw new ConfigError(`Cannot read prompt template ${p}: ${errorMessage(e)}`);
    }
}
