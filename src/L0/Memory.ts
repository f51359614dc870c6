/**
 * An abstraction class for allocating/reading buffers and handling their I/O sequentially.
 * All multi-byte integers are big-endian, the byte order used throughout the metadata file.
 *
 * Every method accepts an optional absolute `index`. When it is given the cursor
 * is left untouched, otherwise the read/write happens at the cursor and advances it.
 */
export default class Memory {

    // Props ==================================================================

    /** Number of bytes written to the internal buffer. */
    public bytesWritten = 0
    /** Number of bytes read from the internal buffer. */
    public bytesRead = 0
    /** Length of the internal buffer. */
    public length: number
    /** The underlying buffer instance. */
    public buffer: Buffer

    // Class ==================================================================

    private constructor(buffer: Buffer) {
        this.buffer = buffer
        this.length = buffer.length
    }

    /** Wraps an existing buffer and returns a new Memory instance */
    public static wrap(buffer: Buffer) {
        return new this(buffer)
    }
    /** Allocates a zero-filled portion of memory equal to `size`. */
    public static alloc(size: number) {
        return new this(Buffer.alloc(size))
    }

    // Sequential input =======================================================

    private advanceWrite(size: number, index?: number) {
        const at = index === undefined ? this.bytesWritten : index
        if (at + size > this.length) {
            throw new RangeError(`Write of ${size} bytes at offset ${at} exceeds buffer length ${this.length}.`)
        }
        if (index === undefined) this.bytesWritten += size
        return at
    }

    /** Sequentially writes an unsigned 8-bit integer. */
    public writeUInt8(value: number, index?: number) {
        this.buffer.writeUInt8(value, this.advanceWrite(1, index))
    }
    /** Sequentially writes an unsigned 16-bit integer. */
    public writeUInt16(value: number, index?: number) {
        this.buffer.writeUInt16BE(value, this.advanceWrite(2, index))
    }
    /** Sequentially writes a signed 16-bit integer. */
    public writeInt16(value: number, index?: number) {
        this.buffer.writeInt16BE(value, this.advanceWrite(2, index))
    }
    /** Sequentially writes an unsigned 32-bit integer. */
    public writeUInt32(value: number, index?: number) {
        this.buffer.writeUInt32BE(value, this.advanceWrite(4, index))
    }
    /** Sequentially writes a signed 32-bit integer. */
    public writeInt32(value: number, index?: number) {
        this.buffer.writeInt32BE(value, this.advanceWrite(4, index))
    }
    /** Sequentially writes an unsigned 64-bit integer. */
    public writeUInt64(value: bigint, index?: number) {
        this.buffer.writeBigUInt64BE(value, this.advanceWrite(8, index))
    }
    /** Sequentially writes a signed 64-bit integer. */
    public writeInt64(value: bigint, index?: number) {
        this.buffer.writeBigInt64BE(value, this.advanceWrite(8, index))
    }
    /** Sequentially writes a 64-bit float. */
    public writeDouble(value: number, index?: number) {
        this.buffer.writeDoubleBE(value, this.advanceWrite(8, index))
    }
    /** Sequentially writes an ASCII string (one byte per character). */
    public writeASCII(value: string, index?: number) {
        this.buffer.write(value, this.advanceWrite(value.length, index), 'latin1')
    }
    /** Sequentially writes a UTF-16BE string (two bytes per code unit). */
    public writeUTF16(value: string, index?: number) {
        this.write(Memory.toUTF16BE(value), index)
    }
    /** Sequentially writes raw data. */
    public write(value: Buffer, index?: number) {
        value.copy(this.buffer, this.advanceWrite(value.length, index))
    }

    // Sequential output ======================================================

    private advanceRead(size: number, index?: number) {
        const at = index === undefined ? this.bytesRead : index
        if (at + size > this.length) {
            throw new RangeError(`Read of ${size} bytes at offset ${at} exceeds buffer length ${this.length}.`)
        }
        if (index === undefined) this.bytesRead += size
        return at
    }

    /** Sequentially reads an unsigned 8-bit integer. */
    public readUInt8(index?: number) {
        return this.buffer.readUInt8(this.advanceRead(1, index))
    }
    /** Sequentially reads an unsigned 16-bit integer. */
    public readUInt16(index?: number) {
        return this.buffer.readUInt16BE(this.advanceRead(2, index))
    }
    /** Sequentially reads an unsigned 32-bit integer. */
    public readUInt32(index?: number) {
        return this.buffer.readUInt32BE(this.advanceRead(4, index))
    }
    /** Sequentially reads a signed 32-bit integer. */
    public readInt32(index?: number) {
        return this.buffer.readInt32BE(this.advanceRead(4, index))
    }
    /** Sequentially reads an unsigned 64-bit integer. */
    public readUInt64(index?: number) {
        return this.buffer.readBigUInt64BE(this.advanceRead(8, index))
    }
    /** Sequentially reads a signed 64-bit integer. */
    public readInt64(index?: number) {
        return this.buffer.readBigInt64BE(this.advanceRead(8, index))
    }
    /** Sequentially reads an unsigned integer of `size` bytes (1-8). */
    public readUIntN(size: number, index?: number) {
        const start = this.advanceRead(size, index)
        if (size <= 6) return this.buffer.readUIntBE(start, size)
        let value = 0n
        for (const byte of this.buffer.subarray(start, start + size)) value = (value << 8n) | BigInt(byte)
        return Number(value)
    }
    /** Sequentially reads a 32-bit float. */
    public readFloat(index?: number) {
        return this.buffer.readFloatBE(this.advanceRead(4, index))
    }
    /** Sequentially reads a 64-bit float. */
    public readDouble(index?: number) {
        return this.buffer.readDoubleBE(this.advanceRead(8, index))
    }
    /** Sequentially reads an ASCII string of `length` bytes. */
    public readASCII(length: number, index?: number) {
        const start = this.advanceRead(length, index)
        return this.buffer.toString('latin1', start, start + length)
    }
    /** Sequentially reads a UTF-16BE string of `units` code units. */
    public readUTF16(units: number, index?: number) {
        return Memory.fromUTF16BE(this.read(units * 2, index))
    }
    /**
     * Sequentially reads raw data.
     * Uses `Buffer.subarray` internally, modifying the content will
     * cause changes to the original buffer due to memory being shared.
     */
    public read(length: number, index?: number) {
        const start = this.advanceRead(length, index)
        return this.buffer.subarray(start, start + length)
    }

    // Utilities ==============================================================

    /** Encodes a string as UTF-16BE code units. */
    public static toUTF16BE = (value: string) =>
        Buffer.from(value, 'utf16le').swap16()

    /** Decodes UTF-16BE code units without touching the source buffer. */
    public static fromUTF16BE = (data: Buffer) =>
        Buffer.from(data).swap16().toString('utf16le')

    /** Checks whether a string only contains 7-bit ASCII characters. */
    public static isASCII = (value: string) =>
        /^[\x00-\x7F]*$/.test(value)

}
