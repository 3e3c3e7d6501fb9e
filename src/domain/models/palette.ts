//
//
//

import { ValidationError } from "../errors";
import { GridLimits } from "./limits";

export type RGB = readonly [number, number, number];

export interface PaletteEntry {
    readonly index: number;

    readonly name: string;

    readonly hex: string;

    readonly rgb: RGB;
}

function entry(index: number, name: string, hex: string): PaletteEntry {
    const rgb: RGB = [
        parseInt(hex.slice(1, 3), 16),
        parseInt(hex.slice(3, 5), 16),
        parseInt(hex.slice(5, 7), 16),
    ];

    return Object.freeze({ index, name, hex, rgb: Object.freeze(rgb) });
}

const BASE_ENTRIES: readonly PaletteEntry[] = [
    entry(0, "black", "#000000"),
    entry(1, "blue", "#0074D9"),
    entry(2, "red", "#FF4136"),
    entry(3, "green", "#2ECC40"),
    entry(4, "yellow", "#FFDC00"),
    entry(5, "gray", "#AAAAAA"),
    entry(6, "magenta", "#F012BE"),
    entry(7, "orange", "#FF851B"),
    entry(8, "sky blue", "#7FDBFF"),
    entry(9, "maroon", "#870C25"),
];

const EXTENDED_ENTRIES: readonly PaletteEntry[] = [
    ...BASE_ENTRIES,
    entry(10, "slate gray", "#577590"),
    entry(11, "peach", "#FFC3A0"),
    entry(12, "light green", "#B4FFB4"),
    entry(13, "cream", "#FFFFC8"),
    entry(14, "lavender", "#DCA0DC"),
    entry(15, "light blue", "#A0DCFF"),
];

/**
 * Palette maps color indices to display colors. Palettes are immutable and
 * meant to be shared: use `Palette.BASE` or `Palette.EXTENDED`.
 */
export class Palette {
    public readonly name: string;

    private readonly _entries: readonly PaletteEntry[];

    private constructor(name: string, entries: readonly PaletteEntry[]) {
        this.name = name;
        this._entries = Object.freeze(entries.slice());
        Object.freeze(this);
    }

    public get size(): number {
        return this._entries.length;
    }

    public get maxColor(): number {
        return this._entries.length - 1;
    }

    public has(index: number): boolean {
        return Number.isInteger(index) && index >= 0 && index < this._entries.length;
    }

    /**
     * @throws ValidationError if the index is not a color of this palette.
     */
    public entry(index: number): PaletteEntry {
        if (!this.has(index)) {
            throw new ValidationError(
                `Color index ${index} must be between 0-${this.maxColor}.`,
            );
        }

        return this._entries[index];
    }

    public hex(index: number): string {
        return this.entry(index).hex;
    }

    public rgb(index: number): RGB {
        return this.entry(index).rgb;
    }

    public entries(): readonly PaletteEntry[] {
        return this._entries;
    }

    /**
     * Returns the smallest shared palette that can display every color the
     * limits allow.
     */
    public static forLimits(limits: GridLimits): Palette {
        return limits.maxColor <= Palette.BASE.maxColor ? Palette.BASE : Palette.EXTENDED;
    }

    public static readonly BASE = new Palette("base", BASE_ENTRIES);

    public static readonly EXTENDED = new Palette("extended", EXTENDED_ENTRIES);
}
