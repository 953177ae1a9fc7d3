/**
 * Byte sinks the encode session writes to
 */

/**
 * Anything that accepts raw printer bytes, in order.
 * Transport failures are the sink's own and propagate to the caller.
 */
export interface ByteSink {
  write(data: Uint8Array): void
}

/**
 * In-memory sink; collects a print job before it is handed to a transport.
 */
class BufferSink implements ByteSink {
  _chunks: Uint8Array[]

  constructor() {
    this._chunks = []
  }

  write(data: Uint8Array): void {
    this._chunks.push(Uint8Array.from(data))
  }

  get chunks(): readonly Uint8Array[] {
    return this._chunks
  }

  get length(): number {
    return this._chunks.reduce((total: number, chunk: Uint8Array) => total + chunk.length, 0)
  }

  /**
   * All chunks concatenated in write order
   */
  toBytes(): Uint8Array {
    const out = new Uint8Array(this.length)
    let offset = 0
    for (const chunk of this._chunks) {
      out.set(chunk, offset)
      offset += chunk.length
    }
    return out
  }

  clear(): void {
    this._chunks = []
  }
}

export default BufferSink
export { BufferSink }
