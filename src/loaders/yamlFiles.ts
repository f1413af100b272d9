/**
 * Shared helpers for reading YAML definition files from a directory
 */

import * as fs from 'fs';
import { readFile } from 'fs/promises';
import * as path from 'path';
import { glob } from 'glob';
import * as yaml from 'js-yaml';
import { DefinitionLoadError } from '../core/errors.js';
import { LIMITS } from '../utils/constants.js';
import { validateYamlSafety } from '../utils/validation.js';

/**
 * List files with the given extensions directly inside a directory, sorted by path
 *
 * @throws DefinitionLoadError if the directory is missing or holds too many files
 */
export async function listDefinitionFiles(directory: string, extensions: readonly string[]): Promise<string[]> {
    const resolvedDir = path.resolve(directory);

    if (!fs.existsSync(resolvedDir) || !fs.statSync(resolvedDir).isDirectory()) {
        throw new DefinitionLoadError(resolvedDir, 'directory not found');
    }

    const patterns = extensions.map((ext) => `*${ext}`);
    const files = await glob(patterns, {
        cwd: resolvedDir,
        absolute: true,
        nodir: true,
    });

    if (files.length > LIMITS.MAX_FILES_PER_DIRECTORY) {
        throw new DefinitionLoadError(
            resolvedDir,
            `too many definition files (${files.length} > ${LIMITS.MAX_FILES_PER_DIRECTORY})`
        );
    }

    return files.sort();
}

/**
 * Parse YAML content after the YAML bomb checks
 *
 * @throws DefinitionLoadError if the content is unsafe or not valid YAML
 */
export function parseYaml(content: string, filePath: string): unknown {
    const safety = validateYamlSafety(content);
    if (!safety.safe) {
        throw new DefinitionLoadError(filePath, safety.error ?? 'unsafe YAML content');
    }

    try {
        return yaml.load(content, { filename: filePath });
    } catch (error) {
        if (error instanceof yaml.YAMLException) {
            throw new DefinitionLoadError(filePath, `invalid YAML (${error.reason})`);
        }
        throw error;
    }
}

/**
 * Read and parse a YAML file
 *
 * @throws DefinitionLoadError on filesystem or parse failures
 */
export async function readYamlFile(filePath: string): Promise<unknown> {
    let content: string;
    try {
        content = await readFile(filePath, 'utf-8');
    } catch (error) {
        if (error instanceof Error) {
            const nodeError: NodeJS.ErrnoException = error;
            if (nodeError.code === 'EACCES') {
                throw new DefinitionLoadError(filePath, 'permission denied');
            } else if (nodeError.code === 'ENOENT') {
                throw new DefinitionLoadError(filePath, 'file not found');
            } else if (nodeError.code === 'EISDIR') {
                throw new DefinitionLoadError(filePath, 'path is a directory, not a file');
            }
        }
        throw error;
    }

    return parseYaml(content, filePath);
}
