/**
 * Policy Mapper
 * Resolves a policy's compliance references against a standard catalog
 */

import type { PolicyStandardMapping } from '../types/compliance.js';
import type { Policy } from '../types/policy.js';
import { parseReference } from './ReferenceParser.js';
import type { StandardCatalog } from './StandardCatalog.js';

/**
 * Compliance references declared by a policy. Non-string entries are ignored.
 */
export function complianceReferences(policy: Policy): string[] {
    const references = policy.metadata?.compliance;
    if (!Array.isArray(references)) {
        return [];
    }
    return references.filter((reference): reference is string => typeof reference === 'string');
}

/**
 * Mapping of one policy plus the references whose standard the catalog lacks
 */
export interface PolicyResolution {
    mapping: PolicyStandardMapping;
    /** In declaration order */
    unresolved: string[];
}

/**
 * Resolve every reference of a policy in one pass.
 *
 * - References to standards missing from the catalog are collected as unresolved.
 * - A reference naming a known standard without a control adds nothing:
 *   a standard only appears once at least one of its controls is referenced.
 * - Control ids are not checked against the standard's control list.
 */
export function resolvePolicy(policy: Policy, catalog: StandardCatalog): PolicyResolution {
    const mapping: PolicyStandardMapping = new Map();
    const unresolved: string[] = [];

    for (const reference of complianceReferences(policy)) {
        const { standardId, controlId } = parseReference(reference);

        if (!catalog.has(standardId)) {
            unresolved.push(reference);
            continue;
        }
        if (controlId === undefined) {
            continue;
        }

        let controls = mapping.get(standardId);
        if (!controls) {
            controls = new Set();
            mapping.set(standardId, controls);
        }
        controls.add(controlId);
    }

    return { mapping, unresolved };
}

/**
 * Map one policy to the standards and controls it references
 */
export function mapPolicy(policy: Policy, catalog: StandardCatalog): PolicyStandardMapping {
    return resolvePolicy(policy, catalog).mapping;
}

/**
 * Catalog-bound mapper
 */
export class PolicyMapper {
    constructor(private readonly catalog: StandardCatalog) {}

    map(policy: Policy): PolicyStandardMapping {
        return mapPolicy(policy, this.catalog);
    }

    resolve(policy: Policy): PolicyResolution {
        return resolvePolicy(policy, this.catalog);
    }

    /**
     * References whose standard is not in the catalog, in declaration order
     */
    unresolvedReferences(policy: Policy): string[] {
        return resolvePolicy(policy, this.catalog).unresolved;
    }
}
