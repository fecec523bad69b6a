/**
 * @module device/identifier
 * @description Interned device identity token
 *
 * `DeviceId.of(raw)` returns the same instance for equal raw values, so identifiers can key
 * a `Map` or `Set` directly. Raw values of different types never compare equal
 * (`DeviceId.of(1) !== DeviceId.of('1')`).
 *
 * The intern table holds its identifiers weakly: once nothing else references an
 * identifier it is collected and its entry is dropped, so per-episode ids do not
 * accumulate over a long simulation.
 */

import { ValidationError } from '../../core/errors';
import type { RawDeviceId } from './types';

function keyOf(raw: RawDeviceId): string {
    return typeof raw === 'number' ? `n:${raw}` : `s:${raw}`;
}

export class DeviceId {
    private static readonly interned = new Map<string, WeakRef<DeviceId>>();

    private static readonly cleanup = new FinalizationRegistry<string>((key) => {
        DeviceId.dropIfCollected(key);
    });

    /** Caller-supplied identifier */
    readonly raw: RawDeviceId;
    /** Type-tagged string form, unique per raw value */
    readonly key: string;

    private constructor(raw: RawDeviceId, key: string) {
        this.raw = raw;
        this.key = key;
        Object.freeze(this);
    }

    /**
     * Get the identifier for a raw value
     *
     * @throws ValidationError when `raw` is neither a string nor a number
     */
    static of(raw: RawDeviceId | DeviceId): DeviceId {
        if (raw instanceof DeviceId) {
            return raw;
        }
        if (typeof raw !== 'string' && typeof raw !== 'number') {
            throw new ValidationError('Device id must be a string or a number', { received: raw });
        }

        const key = keyOf(raw);
        const live = DeviceId.interned.get(key)?.deref();
        if (live) {
            return live;
        }

        const id = new DeviceId(raw, key);
        DeviceId.interned.set(key, new WeakRef(id));
        DeviceId.cleanup.register(id, key);
        return id;
    }

    /** Entries currently in the intern table, collected ones not yet swept included */
    static get internedCount(): number {
        return DeviceId.interned.size;
    }

    /**
     * Drop every entry whose identifier has been collected
     *
     * The finalization callback does this per entry on its own schedule; `sweep` does it now.
     *
     * @returns Number of entries removed
     */
    static sweep(): number {
        let removed = 0;
        for (const key of [...DeviceId.interned.keys()]) {
            if (DeviceId.dropIfCollected(key)) {
                removed++;
            }
        }
        return removed;
    }

    private static dropIfCollected(key: string): boolean {
        const ref = DeviceId.interned.get(key);
        // a re-interned id under the same key must survive the old one's finalizer
        if (ref && ref.deref() === undefined) {
            DeviceId.interned.delete(key);
            return true;
        }
        return false;
    }

    equals(other: DeviceId): boolean {
        return this.key === other.key;
    }

    toString(): string {
        return String(this.raw);
    }

    toJSON(): RawDeviceId {
        return this.raw;
    }
}
