/**
 * Copy file bytes into a standalone ArrayBuffer for the core.
 * A Node Buffer may be a view into a larger shared pool, so its
 * `.buffer` cannot be handed over directly.
 */
export function toArrayBuffer(data: Uint8Array): ArrayBuffer {
    const copy = new ArrayBuffer(data.byteLength);
    new Uint8Array(copy).set(data);
    return copy;
}
