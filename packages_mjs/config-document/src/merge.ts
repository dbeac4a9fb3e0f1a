import { Document, MapDocument, map } from './document.js';

/**
 * Deep merge two documents. Maps merge key by key; for any other pair the
 * source replaces the target (lists are replaced, not concatenated).
 * Neither input is mutated.
 */
export function mergeDocuments(target: Document, source: Document): Document {
    if (target.kind !== 'map' || source.kind !== 'map') {
        return source;
    }
    return mergeMaps(target, source);
}

function mergeMaps(target: MapDocument, source: MapDocument): MapDocument {
    const result = map(target.entries);
    for (const [key, value] of source.entries) {
        const existing = result.entries.get(key);
        result.entries.set(key, existing === undefined ? value : mergeDocuments(existing, value));
    }
    return result;
}

/**
 * Fold documents left to right into a single map; later documents win.
 */
export function mergeAll(docs: Iterable<MapDocument>): MapDocument {
    let accumulator = map();
    for (const doc of docs) {
        accumulator = mergeMaps(accumulator, doc);
    }
    return accumulator;
}
