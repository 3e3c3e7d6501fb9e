//
//
//

/**
 * A value that can be stored in a HashSet.
 * Equal values must return the same hash.
 */
export interface Hashable {
    hash(): string;
}
