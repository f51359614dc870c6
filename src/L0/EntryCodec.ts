// Imports =============================================================================================================

import type * as T from '../../types.js'
import DSMetaError from '../errors/DSMetaError.js'
import Memory from './Memory.js'

// Types ===============================================================================================================

export type TRecordType = 'bool' | 'long' | 'shor' | 'blob' | 'ustr' | 'type' | 'comp' | 'dutc'

export const RECORD_TYPES: readonly TRecordType[] = ['bool', 'long', 'shor', 'blob', 'ustr', 'type', 'comp', 'dutc']

export type TRecordValue =
    | { type: 'bool', value: boolean }
    | { type: 'long', value: number }
    | { type: 'shor', value: number }
    | { type: 'blob', value: Buffer }
    | { type: 'ustr', value: string }
    | { type: 'type', value: string }
    | { type: 'comp', value: bigint }
    | { type: 'dutc', value: bigint }

export interface TRecordKey {
    /** Owning file name, "." for the directory itself  */ filename:   string
    /** Four-character field code                        */ code:       string
}

export interface TRecord extends TRecordKey {
    /** Typed value                                      */ value:      TRecordValue
}

export interface TDecoded<V> {
    /** Decoded item                                     */ value:      V
    /** Number of bytes consumed from the source         */ length:     number
}

type TDecodeCode = 'L0_EC_MALFORMED' | 'L0_EC_UNKNOWN_TYPE'
type TEncodeCode = 'L0_EC_ENCODE' | 'L0_EC_RANGE'

// Exports =============================================================================================================

const INT32_MIN = -0x80000000
const INT32_MAX =  0x7FFFFFFF
const INT16_MIN = -0x8000
const INT16_MAX =  0x7FFF
const UINT64_MAX = 0xFFFFFFFFFFFFFFFFn

/** Seconds between 1904-01-01 and 1970-01-01 (UTC). */
const MAC_EPOCH_OFFSET = 2082844800

/**
 * Encodes and decodes typed record values and whole records.
 *
 * Record layout:
 *
    Index | Size   | Type   | Description
    ------|--------|--------|------------------------------------------------
    0     | 4B     | UInt32 | Filename length in UTF-16 code units (N)
    4     | 2N     | UTF16  | Filename (big-endian code units)
    4+2N  | 4B     | ASCII  | Field code
    8+2N  | 4B     | ASCII  | Value type tag
    12+2N | *      | *      | Value (layout depends on the type tag)
 */
export default class EntryCodec {

    public static isRecordType(type: string): type is TRecordType {
        return RECORD_TYPES.some(known => known === type)
    }

    // Values =================================================================

    /**
     * Decodes a single value of the given type starting at `offset`.
     * Bytes past the end of the value are left untouched.
     *
        Type | Layout
        -----|---------------------------------------------------------------
        bool | 1B, 0 or 1
        long | 4B signed
        shor | 4B, only the low 16 bits (signed) are meaningful
        blob | 4B length + raw bytes
        ustr | 4B code unit count + UTF-16BE code units
        type | 4B ASCII code
        comp | 8B unsigned
        dutc | 8B unsigned, 1/65536 seconds since 1904-01-01
     */
    public static decode(type: string, bytes: Buffer, offset = 0): T.XEav<TDecoded<TRecordValue>, TDecodeCode> {

        if (!this.isRecordType(type)) return DSMetaError.eav('L0_EC_UNKNOWN_TYPE', null, null, { type, offset })
        const tag: TRecordType = type

        try {

            const mem = Memory.wrap(bytes)
            mem.bytesRead = offset

            const value = ((): TRecordValue => {
                switch (tag) {
                    case 'bool': return { type: tag, value: mem.readUInt8() !== 0 }
                    case 'long': return { type: tag, value: mem.readInt32() }
                    case 'shor': return { type: tag, value: mem.read(4).readInt16BE(2) }
                    case 'blob': return { type: tag, value: Buffer.from(mem.read(mem.readUInt32())) }
                    case 'ustr': return { type: tag, value: mem.readUTF16(mem.readUInt32()) }
                    case 'type': return { type: tag, value: mem.readASCII(4) }
                    case 'comp': return { type: tag, value: mem.readUInt64() }
                    case 'dutc': return { type: tag, value: mem.readUInt64() }
                }
            })()

            return [null, { value, length: mem.bytesRead - offset }]

        }
        catch (error) {
            return DSMetaError.eav('L0_EC_MALFORMED', null, error as Error, { type, offset, available: bytes.length - offset })
        }
    }

    /** Encodes a single value into its exact byte representation. */
    public static encode(value: TRecordValue): T.XEav<Buffer, TEncodeCode> {

        const rangeError = this.checkRange(value)
        if (rangeError) return DSMetaError.eav('L0_EC_RANGE', rangeError, null, { type: value.type })

        try {

            const mem = Memory.alloc(this.byteLength(value))

            switch (value.type) {
                case 'bool': mem.writeUInt8(value.value ? 1 : 0); break
                case 'long': mem.writeInt32(value.value); break
                case 'shor': mem.writeUInt16(0); mem.writeInt16(value.value); break
                case 'blob': mem.writeUInt32(value.value.length); mem.write(value.value); break
                case 'ustr': mem.writeUInt32(value.value.length); mem.writeUTF16(value.value); break
                case 'type': mem.writeASCII(value.value); break
                case 'comp': mem.writeUInt64(value.value); break
                case 'dutc': mem.writeUInt64(value.value); break
            }

            return [null, mem.buffer]

        }
        catch (error) {
            return DSMetaError.eav('L0_EC_ENCODE', null, error as Error, { type: value.type })
        }
    }

    /** Returns the number of bytes `encode` produces for the value. */
    public static byteLength(value: TRecordValue): number {
        switch (value.type) {
            case 'bool': return 1
            case 'long':
            case 'shor':
            case 'type': return 4
            case 'blob': return 4 + value.value.length
            case 'ustr': return 4 + value.value.length * 2
            case 'comp':
            case 'dutc': return 8
        }
    }

    private static checkRange(value: TRecordValue): string | undefined {
        switch (value.type) {
            case 'long':
                if (!Number.isInteger(value.value) || value.value < INT32_MIN || value.value > INT32_MAX)
                    return `Value ${value.value} does not fit a signed 32-bit integer.`
                break
            case 'shor':
                if (!Number.isInteger(value.value) || value.value < INT16_MIN || value.value > INT16_MAX)
                    return `Value ${value.value} does not fit a signed 16-bit integer.`
                break
            case 'type':
                if (!this.isCode(value.value))
                    return `Type code "${value.value}" must be exactly 4 ASCII characters.`
                break
            case 'comp':
            case 'dutc':
                if (value.value < 0n || value.value > UINT64_MAX)
                    return `Value ${value.value} does not fit an unsigned 64-bit integer.`
                break
        }
    }

    // Records ================================================================

    /** Decodes a full record (key and value) starting at `offset`. */
    public static decodeRecord(bytes: Buffer, offset = 0): T.XEav<TDecoded<TRecord>, TDecodeCode> {

        let filename: string
        let code: string
        let type: string
        let valueOffset: number

        try {
            const mem = Memory.wrap(bytes)
            mem.bytesRead = offset
            filename = mem.readUTF16(mem.readUInt32())
            code = mem.readASCII(4)
            type = mem.readASCII(4)
            valueOffset = mem.bytesRead
        }
        catch (error) {
            return DSMetaError.eav('L0_EC_MALFORMED', null, error as Error, { offset, available: bytes.length - offset })
        }

        const [error, decoded] = this.decode(type, bytes, valueOffset)
        if (error) {
            error.meta.filename = filename
            error.meta.code = code
            return [error, null]
        }

        return [null, {
            value: { filename, code, value: decoded.value },
            length: valueOffset - offset + decoded.length,
        }]

    }

    /** Encodes a full record (key and value). */
    public static encodeRecord(record: TRecord): T.XEav<Buffer, TEncodeCode> {

        if (!this.isCode(record.code)) {
            return DSMetaError.eav('L0_EC_RANGE', `Field code "${record.code}" must be exactly 4 ASCII characters.`, null, { ...record })
        }

        const [valueError, value] = this.encode(record.value)
        if (valueError) return [valueError, null]

        try {
            const name = Memory.toUTF16BE(record.filename)
            const mem = Memory.alloc(12 + name.length + value.length)
            mem.writeUInt32(record.filename.length)
            mem.write(name)
            mem.writeASCII(record.code)
            mem.writeASCII(record.value.type)
            mem.write(value)
            return [null, mem.buffer]
        }
        catch (error) {
            return DSMetaError.eav('L0_EC_ENCODE', null, error as Error, { filename: record.filename, code: record.code })
        }
    }

    /** Returns the number of bytes `encodeRecord` produces for the record. */
    public static recordByteLength(record: TRecord): number {
        return 12 + record.filename.length * 2 + this.byteLength(record.value)
    }

    // Ordering ===============================================================

    /**
     * Orders filenames case-insensitively, falling back to an exact
     * comparison so that names differing only in case stay distinct.
     */
    public static compareFilenames(a: string, b: string): number {
        const la = a.toLowerCase()
        const lb = b.toLowerCase()
        if (la !== lb) return la < lb ? -1 : 1
        if (a !== b) return a < b ? -1 : 1
        return 0
    }

    /** Orders records by filename, then byte-wise by code. */
    public static compareRecords(a: TRecordKey, b: TRecordKey): number {
        const byName = this.compareFilenames(a.filename, b.filename)
        if (byName !== 0) return byName
        if (a.code !== b.code) return a.code < b.code ? -1 : 1
        return 0
    }

    // Misc ===================================================================

    public static isCode(code: string): boolean {
        return code.length === 4 && Memory.isASCII(code)
    }

    /** Converts a `dutc` timestamp to a `Date`. */
    public static dutcToDate(value: bigint): Date {
        const seconds = Number(value) / 65536
        return new Date((seconds - MAC_EPOCH_OFFSET) * 1000)
    }

    /** Converts a `Date` to a `dutc` timestamp. */
    public static dateToDutc(date: Date): bigint {
        const seconds = date.getTime() / 1000 + MAC_EPOCH_OFFSET
        return BigInt(Math.round(seconds * 65536))
    }

}
