/**
 * Standard Catalog
 *
 * Immutable, in-memory collection of compliance standards keyed by id.
 * Built once from external definitions, then only read during mapping.
 */

import type { Control, Standard, StandardDefinition, ControlDefinition } from '../types/compliance.js';
import type { Logger } from '../types/index.js';
import { DuplicateStandardError } from './errors.js';

/**
 * What to do when two definitions share a standard id
 * - warn: keep the later definition and log a warning
 * - error: throw DuplicateStandardError
 */
export type DuplicateStandardStrategy = 'warn' | 'error';

export interface StandardCatalogOptions {
    onDuplicate?: DuplicateStandardStrategy;
    logger?: Logger;
}

function buildControl(definition: ControlDefinition): Control {
    return Object.freeze({
        id: definition.id,
        title: definition.title,
        description: definition.description,
        severity: definition.severity ?? 'medium',
        checks: Object.freeze((definition.checks ?? []).map((check) => Object.freeze({ ...check }))),
    });
}

function buildStandard(definition: StandardDefinition): Standard {
    return Object.freeze({
        id: definition.id,
        name: definition.name,
        version: definition.version,
        controls: Object.freeze(definition.controls.map(buildControl)),
    });
}

export class StandardCatalog {
    private readonly standardsById: ReadonlyMap<string, Standard>;

    private constructor(standardsById: Map<string, Standard>) {
        this.standardsById = standardsById;
    }

    /**
     * Build a catalog from definitions in order. Missing control severity defaults to
     * "medium" and missing checks to an empty list.
     *
     * @throws DuplicateStandardError when onDuplicate is "error" and an id repeats
     */
    static fromDefinitions(
        definitions: readonly StandardDefinition[],
        options: StandardCatalogOptions = {}
    ): StandardCatalog {
        const { onDuplicate = 'warn', logger } = options;
        const standardsById = new Map<string, Standard>();

        for (const definition of definitions) {
            if (standardsById.has(definition.id)) {
                if (onDuplicate === 'error') {
                    throw new DuplicateStandardError(definition.id);
                }
                logger?.warn(`Standard ${definition.id} defined more than once; keeping the last definition`);
            }
            standardsById.set(definition.id, buildStandard(definition));
        }

        return new StandardCatalog(standardsById);
    }

    static empty(): StandardCatalog {
        return new StandardCatalog(new Map());
    }

    get size(): number {
        return this.standardsById.size;
    }

    has(standardId: string): boolean {
        return this.standardsById.has(standardId);
    }

    get(standardId: string): Standard | undefined {
        return this.standardsById.get(standardId);
    }

    /**
     * Look up a control by standard and control id
     */
    getControl(standardId: string, controlId: string): Control | undefined {
        return this.standardsById.get(standardId)?.controls.find((control) => control.id === controlId);
    }

    /** Standard ids in insertion order */
    ids(): string[] {
        return [...this.standardsById.keys()];
    }

    standards(): Standard[] {
        return [...this.standardsById.values()];
    }
}
