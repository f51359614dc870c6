// Imports =============================================================================================================

import type * as T from '../../types.js'
import DSMetaError from '../errors/DSMetaError.js'
import Memory from './Memory.js'

// Types ===============================================================================================================

/**
 * Floating point number read from (or to be written as) a `real` object.
 * Keeps values like `64.0` from being turned into integers on a round trip.
 */
export class PlistReal {
    public readonly value: number
    constructor(value: number) {
        this.value = value
    }
    public valueOf() {
        return this.value
    }
}

/** Keyed-archiver object reference (`uid` object). */
export class PlistUID {
    public readonly value: number
    constructor(value: number) {
        this.value = value
    }
}

export type TPlistScalar = null | boolean | number | bigint | string | Buffer | Date | PlistReal | PlistUID
export type TPlistValue = TPlistScalar | TPlistValue[] | TPlistDict
export interface TPlistDict { [key: string]: TPlistValue }

type TFlatObject =
    | { kind: 'scalar', value: TPlistScalar }
    | { kind: 'array',  refs: number[] }
    | { kind: 'dict',   keys: number[], values: number[] }

interface TParseContext {
    data:       Buffer
    offsets:    number[]
    refSize:    number
    stack:      Set<number>
    /** Decoded arrays and dicts by object reference */
    cache:      Map<number, TPlistValue>
}

// Exports =============================================================================================================

const MAGIC = 'bplist00'
const TRAILER_SIZE = 32
/** Seconds between 1970-01-01 and 2001-01-01 (UTC). */
const APPLE_EPOCH_OFFSET = 978307200

/**
 * Binary property list (`bplist00`) codec.
 *
 * Trailer (last 32 bytes of the data):
 *
    Index | Size | Type   | Description
    ------|------|--------|------------------------------------------------
    0     | 6B   | -      | Unused
    6     | 1B   | UInt8  | Size of an offset table entry
    7     | 1B   | UInt8  | Size of an object reference
    8     | 8B   | UInt64 | Number of objects
    16    | 8B   | UInt64 | Top-level object reference
    24    | 8B   | UInt64 | Offset table position
 *
 * Integers decode to `number`, or to `bigint` when they exceed the safe integer range.
 * Reals decode to `PlistReal`, sets decode to arrays.
 */
export default class Plist {

    // Parsing ================================================================

    public static isBinaryPlist(data: Buffer) {
        return data.length >= MAGIC.length + TRAILER_SIZE && data.toString('latin1', 0, MAGIC.length) === MAGIC
    }

    public static parse(data: Buffer): T.XEav<TPlistValue, 'L0_PL_PARSE' | 'L0_PL_FORMAT'> {

        if (!this.isBinaryPlist(data)) return DSMetaError.eav('L0_PL_FORMAT', null, null, { length: data.length })

        try {

            const trailer = Memory.wrap(data.subarray(data.length - TRAILER_SIZE))
            trailer.bytesRead = 6

            const offsetSize  = trailer.readUInt8()
            const refSize     = trailer.readUInt8()
            const count       = Number(trailer.readUInt64())
            const top         = Number(trailer.readUInt64())
            const tableOffset = Number(trailer.readUInt64())

            if (![1, 2, 4, 8].includes(offsetSize) || ![1, 2, 4, 8].includes(refSize))
                throw new Error(`Unsupported offset/reference size (${offsetSize}/${refSize}).`)
            if (top >= count)
                throw new Error(`Top object ${top} is out of range (${count} objects).`)
            if (tableOffset < MAGIC.length || tableOffset + count * offsetSize > data.length - TRAILER_SIZE)
                throw new Error(`Offset table at ${tableOffset} does not fit within the data.`)

            const table = Memory.wrap(data)
            table.bytesRead = tableOffset

            const offsets: number[] = []
            for (let i = 0; i < count; i++) offsets.push(table.readUIntN(offsetSize))

            return [null, this.readObject({ data, offsets, refSize, stack: new Set(), cache: new Map() }, top)]

        }
        catch (error) {
            return DSMetaError.eav('L0_PL_PARSE', null, error as Error, { length: data.length })
        }
    }

    private static readObject(ctx: TParseContext, ref: number): TPlistValue {

        const offset = ctx.offsets[ref]
        if (offset === undefined) throw new RangeError(`Object reference ${ref} is out of range.`)
        const cached = ctx.cache.get(ref)
        if (cached !== undefined) return cached
        if (ctx.stack.has(ref)) throw new Error(`Circular reference to object ${ref}.`)

        const mem = Memory.wrap(ctx.data)
        mem.bytesRead = offset

        const marker = mem.readUInt8()
        const kind = marker >> 4
        const info = marker & 0x0F

        switch (kind) {
            case 0x0:
                if (info === 0x8) return false
                if (info === 0x9) return true
                if (info === 0x0 || info === 0xF) return null
                break
            case 0x1: return this.readInt(mem, 1 << info)
            case 0x2:
                if (info === 2) return new PlistReal(mem.readFloat())
                if (info === 3) return new PlistReal(mem.readDouble())
                break
            case 0x3:
                if (info === 3) return new Date((mem.readDouble() + APPLE_EPOCH_OFFSET) * 1000)
                break
            case 0x4: return Buffer.from(mem.read(this.readLength(mem, info)))
            case 0x5: return mem.readASCII(this.readLength(mem, info))
            case 0x6: return mem.readUTF16(this.readLength(mem, info))
            case 0x8: return new PlistUID(mem.readUIntN(info + 1))
            case 0xA:
            case 0xC: {
                const refs = this.readRefs(ctx, mem, this.readLength(mem, info))
                ctx.stack.add(ref)
                const items = refs.map(child => this.readObject(ctx, child))
                ctx.stack.delete(ref)
                ctx.cache.set(ref, items)
                return items
            }
            case 0xD: {
                const length = this.readLength(mem, info)
                const keys = this.readRefs(ctx, mem, length)
                const values = this.readRefs(ctx, mem, length)
                const dict: TPlistDict = {}
                ctx.stack.add(ref)
                keys.forEach((keyRef, i) => {
                    const key = this.readObject(ctx, keyRef)
                    if (typeof key !== 'string') throw new Error(`Dictionary key at object ${keyRef} is not a string.`)
                    Object.defineProperty(dict, key, {
                        value: this.readObject(ctx, values[i] ?? -1),
                        enumerable: true,
                        writable: true,
                        configurable: true,
                    })
                })
                ctx.stack.delete(ref)
                ctx.cache.set(ref, dict)
                return dict
            }
        }

        throw new Error(`Unsupported object marker 0x${marker.toString(16).padStart(2, '0')} at offset ${offset}.`)

    }

    private static readInt(mem: Memory, size: number): number | bigint {
        switch (size) {
            case 1: return mem.readUInt8()
            case 2: return mem.readUInt16()
            case 4: return mem.readUInt32()
            case 8: return this.narrow(mem.readInt64())
            case 16: {
                const high = mem.readInt64()
                return this.narrow((high << 64n) | mem.readUInt64())
            }
        }
        throw new Error(`Unsupported integer size ${size}.`)
    }

    private static readLength(mem: Memory, info: number): number {
        if (info !== 0xF) return info
        const marker = mem.readUInt8()
        if (marker >> 4 !== 0x1) throw new Error(`Expected an integer length marker, got 0x${marker.toString(16)}.`)
        const length = this.readInt(mem, 1 << (marker & 0x0F))
        if (typeof length !== 'number' || length < 0) throw new Error(`Invalid object length ${length}.`)
        return length
    }

    private static readRefs(ctx: TParseContext, mem: Memory, count: number): number[] {
        const refs: number[] = []
        for (let i = 0; i < count; i++) {
            refs.push(mem.readUIntN(ctx.refSize))
        }
        return refs
    }

    private static narrow(value: bigint): number | bigint {
        return value >= BigInt(Number.MIN_SAFE_INTEGER) && value <= BigInt(Number.MAX_SAFE_INTEGER) ? Number(value) : value
    }

    // Serialization ==========================================================

    /**
     * Serializes a value as a binary property list.
     * Integral numbers and bigints are written as integers, every other number
     * and every `PlistReal` as a 64-bit real.
     */
    public static serialize(value: TPlistValue): T.XEav<Buffer, 'L0_PL_SERIALIZE'> {
        try {

            const objects: TFlatObject[] = []
            this.flatten(value, objects, new Set(), new Map())

            const refSize = objects.length <= 0xFF ? 1 : objects.length <= 0xFFFF ? 2 : 4
            const parts = objects.map(object => this.encodeObject(object, refSize))

            const offsets: number[] = []
            let position = MAGIC.length
            for (const part of parts) {
                offsets.push(position)
                position += part.length
            }

            const tableOffset = position
            const offsetSize = this.sizeFor(tableOffset)

            const trailer = Memory.alloc(TRAILER_SIZE)
            trailer.bytesWritten = 6
            trailer.writeUInt8(offsetSize)
            trailer.writeUInt8(refSize)
            trailer.writeUInt64(BigInt(objects.length))
            trailer.writeUInt64(0n)
            trailer.writeUInt64(BigInt(tableOffset))

            return [null, Buffer.concat([
                Buffer.from(MAGIC, 'latin1'),
                ...parts,
                ...offsets.map(offset => this.sizedUInt(offset, offsetSize)),
                trailer.buffer,
            ])]

        }
        catch (error) {
            return DSMetaError.eav('L0_PL_SERIALIZE', null, error as Error)
        }
    }

    public static isDict(value: TPlistValue): value is TPlistDict {
        return typeof value === 'object'
            && value !== null
            && !Array.isArray(value)
            && !Buffer.isBuffer(value)
            && !(value instanceof Date)
            && !(value instanceof PlistReal)
            && !(value instanceof PlistUID)
    }

    /** Containers referenced more than once are written once and shared. */
    private static flatten(value: TPlistValue, objects: TFlatObject[], stack: Set<object>, written: Map<object, number>): number {

        const index = objects.length

        if (Array.isArray(value)) {
            if (stack.has(value)) throw new Error('Cannot serialize a circular structure.')
            const shared = written.get(value)
            if (shared !== undefined) return shared
            const slot: TFlatObject = { kind: 'array', refs: [] }
            objects.push(slot)
            written.set(value, index)
            stack.add(value)
            for (const item of value) slot.refs.push(this.flatten(item, objects, stack, written))
            stack.delete(value)
        }
        else if (this.isDict(value)) {
            if (stack.has(value)) throw new Error('Cannot serialize a circular structure.')
            const shared = written.get(value)
            if (shared !== undefined) return shared
            const slot: TFlatObject = { kind: 'dict', keys: [], values: [] }
            const entries = Object.entries(value)
            objects.push(slot)
            written.set(value, index)
            stack.add(value)
            for (const [key] of entries) slot.keys.push(this.flatten(key, objects, stack, written))
            for (const [, item] of entries) slot.values.push(this.flatten(item, objects, stack, written))
            stack.delete(value)
        }
        else {
            objects.push({ kind: 'scalar', value })
        }

        return index

    }

    private static encodeObject(object: TFlatObject, refSize: number): Buffer {
        switch (object.kind) {
            case 'scalar': return this.encodeScalar(object.value)
            case 'array':  return Buffer.concat([
                this.header(0xA, object.refs.length),
                ...object.refs.map(ref => this.sizedUInt(ref, refSize)),
            ])
            case 'dict':   return Buffer.concat([
                this.header(0xD, object.keys.length),
                ...object.keys.map(ref => this.sizedUInt(ref, refSize)),
                ...object.values.map(ref => this.sizedUInt(ref, refSize)),
            ])
        }
    }

    private static encodeScalar(value: TPlistScalar): Buffer {

        if (value === null) return Buffer.from([0x00])
        if (typeof value === 'boolean') return Buffer.from([value ? 0x09 : 0x08])
        if (typeof value === 'bigint') return this.encodeInt(value)
        if (typeof value === 'number') return Number.isInteger(value) ? this.encodeInt(BigInt(value)) : this.encodeReal(value)
        if (value instanceof PlistReal) return this.encodeReal(value.value)
        if (value instanceof PlistUID) {
            const size = this.sizeFor(value.value)
            return Buffer.concat([Buffer.from([0x80 | (size - 1)]), this.sizedUInt(value.value, size)])
        }
        if (value instanceof Date) {
            const mem = Memory.alloc(9)
            mem.writeUInt8(0x33)
            mem.writeDouble(value.getTime() / 1000 - APPLE_EPOCH_OFFSET)
            return mem.buffer
        }
        if (Buffer.isBuffer(value)) return Buffer.concat([this.header(0x4, value.length), value])

        return Memory.isASCII(value)
            ? Buffer.concat([this.header(0x5, value.length), Buffer.from(value, 'latin1')])
            : Buffer.concat([this.header(0x6, value.length), Memory.toUTF16BE(value)])

    }

    private static encodeInt(value: bigint): Buffer {
        if (value < 0n || value > 0xFFFFFFFFn) {
            if (value > 0x7FFFFFFFFFFFFFFFn) {
                const mem = Memory.alloc(17)
                mem.writeUInt8(0x14)
                mem.writeUInt64(0n)
                mem.writeUInt64(value)
                return mem.buffer
            }
            const mem = Memory.alloc(9)
            mem.writeUInt8(0x13)
            mem.writeInt64(value)
            return mem.buffer
        }
        const size = this.sizeFor(Number(value))
        return Buffer.concat([Buffer.from([0x10 | Math.log2(size)]), this.sizedUInt(Number(value), size)])
    }

    private static encodeReal(value: number): Buffer {
        const mem = Memory.alloc(9)
        mem.writeUInt8(0x23)
        mem.writeDouble(value)
        return mem.buffer
    }

    /** Object marker with the length in the low nibble, or a trailing integer when it doesn't fit. */
    private static header(kind: number, length: number): Buffer {
        if (length < 0xF) return Buffer.from([(kind << 4) | length])
        return Buffer.concat([Buffer.from([(kind << 4) | 0xF]), this.encodeInt(BigInt(length))])
    }

    private static sizeFor(value: number): 1 | 2 | 4 | 8 {
        if (value <= 0xFF) return 1
        if (value <= 0xFFFF) return 2
        if (value <= 0xFFFFFFFF) return 4
        return 8
    }

    private static sizedUInt(value: number, size: number): Buffer {
        const buffer = Buffer.alloc(size)
        if (size === 8) buffer.writeBigUInt64BE(BigInt(value))
        else buffer.writeUIntBE(value, 0, size)
        return buffer
    }

}
