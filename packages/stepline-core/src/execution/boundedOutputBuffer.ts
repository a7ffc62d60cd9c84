/**
 * Byte buffer that keeps at most `maxBytes` of a stream and drops the rest.
 */
export class BoundedOutputBuffer {
  private readonly chunks: Buffer[] = []
  private readonly maxBytes: number
  private size = 0
  private overflowed = false

  /**
   * Creates a bounded buffer.
   *
   * @param maxBytes Maximum number of bytes kept.
   */
  public constructor(maxBytes: number) {
    this.maxBytes = Math.max(0, Math.floor(maxBytes))
  }

  /**
   * Appends a chunk, keeping only the part that still fits.
   *
   * @param chunk Raw stream data.
   */
  public append(chunk: Buffer): void {
    if (chunk.length === 0) {
      return
    }

    const remaining = this.maxBytes - this.size
    if (remaining <= 0) {
      this.overflowed = true
      return
    }

    if (chunk.length > remaining) {
      this.chunks.push(chunk.subarray(0, remaining))
      this.size += remaining
      this.overflowed = true
      return
    }

    this.chunks.push(chunk)
    this.size += chunk.length
  }

  /** Number of bytes kept. */
  public get byteLength(): number {
    return this.size
  }

  /** True once any byte has been dropped. */
  public get truncated(): boolean {
    return this.overflowed
  }

  /**
   * Decodes the kept bytes as UTF-8. After truncation, a character whose
   * tail was dropped is left out entirely.
   *
   * @returns Captured text.
   */
  public toString(): string {
    const bytes = Buffer.concat(this.chunks, this.size)
    const end = this.overflowed ? lastCompleteCharacterEnd(bytes) : bytes.length
    return bytes.subarray(0, end).toString('utf8')
  }
}

const lastCompleteCharacterEnd = (bytes: Buffer): number => {
  for (let back = 1; back <= Math.min(4, bytes.length); back += 1) {
    const byte = bytes[bytes.length - back]
    if (byte === undefined) {
      break
    }

    // 10xxxxxx: continuation byte, keep walking back to the lead byte.
    if ((byte & 0xc0) === 0x80) {
      continue
    }

    return back < utf8SequenceLength(byte) ? bytes.length - back : bytes.length
  }

  return bytes.length
}

const utf8SequenceLength = (leadByte: number): number => {
  if (leadByte >= 0xf0) {
    return 4
  }
  if (leadByte >= 0xe0) {
    return 3
  }
  if (leadByte >= 0xc0) {
    return 2
  }
  return 1
}
