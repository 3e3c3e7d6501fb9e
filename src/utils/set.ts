//
//
//

import { Hashable } from "./interfaces";

export class HashSet<V extends Hashable> {
    private readonly _map: Map<string, V> = new Map();

    public add(value: V): void {
        this._map.set(value.hash(), value);
    }

    public has(value: V): boolean {
        return this._map.has(value.hash());
    }
}
