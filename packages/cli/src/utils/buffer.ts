/**
 * Copy a Node Buffer into a standalone ArrayBuffer for the headless core.
 */
export function toArrayBuffer(buffer: Uint8Array): ArrayBuffer {
    const arrayBuffer = new ArrayBuffer(buffer.byteLength);
    new Uint8Array(arrayBuffer).set(buffer);
    return arrayBuffer;
}
