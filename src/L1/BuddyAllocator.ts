// Imports =============================================================================================================

import type * as T from '../../types.js'
import DSMetaError from '../errors/DSMetaError.js'
import Memory from '../L0/Memory.js'
import * as C from '../Constants.js'

// Types ===============================================================================================================

export interface TBlockLocation {
    /** Offset relative to the start of the allocator    */ offset:     number
    /** Block size in bytes (power of two)               */ size:       number
}

// Exports =============================================================================================================

const FILE_MAGIC = 1
const ALLOCATOR_MAGIC = 'Bud1'
/** Bytes preceding the allocator; every block offset is relative to this point. */
const PREFIX_SIZE = 4
const HEADER_SIZE = 32
const FREE_LIST_COUNT = 32
const ADDRESS_PAGE = 256
/** Header trailer found in files written by the system file manager. */
const HEADER_TRAILER = Buffer.from([0x00, 0x00, 0x10, 0x0C, 0x00, 0x00, 0x00, 0x87, 0x00, 0x00, 0x20, 0x0B, 0x00, 0x00, 0x00, 0x00])

/**
 * Buddy allocator wrapped around the B-tree blocks of the metadata file.
 *
 * File header:
 *
    Index | Size | Type   | Description
    ------|------|--------|------------------------------------------------
    0     | 4B   | UInt32 | File magic (1)
    4     | 4B   | ASCII  | Allocator magic ("Bud1")
    8     | 4B   | UInt32 | Root block offset
    12    | 4B   | UInt32 | Root block size
    16    | 4B   | UInt32 | Root block offset (repeated)
    20    | 16B  | Buffer | Unknown
 *
 * Root block:
 *
    Size       | Type     | Description
    -----------|----------|------------------------------------------------
    4B         | UInt32   | Block count (N)
    4B         | UInt32   | Reserved
    4B * N'    | UInt32[] | Block addresses, N padded to a multiple of 256
    4B         | UInt32   | Table of contents entry count
    *          | *        | TOC entries: name length (UInt8), name, block number (UInt32)
    *          | *        | 32 free lists: offset count (UInt32), offsets (UInt32[])
 *
 * A block address packs the offset and size together: the low 5 bits hold
 * log2 of the size and the remaining bits the (32-byte aligned) offset.
 */
export default class BuddyAllocator {

    // Internal ===============================================================

    /** Block number to packed address. */
    public declare addresses: number[]
    /** Named entry points (the B-tree's "DSDB" superblock). */
    public declare toc: Map<string, number>
    /** Free offsets indexed by log2 of their size. */
    public declare freeLists: number[][]

    private declare data: Buffer

    private constructor() {}

    // Reading ================================================================

    public static read(data: Buffer): T.XEav<BuddyAllocator, 'L1_BA_HEADER' | 'L1_BA_ROOT'> {

        if (data.length < PREFIX_SIZE + HEADER_SIZE) return DSMetaError.eav('L1_BA_HEADER', 'The file is too short to contain an allocator header.', null, { length: data.length })

        const header = Memory.wrap(data)
        const fileMagic     = header.readUInt32()
        const magic         = header.readASCII(4)
        const rootOffset    = header.readUInt32()
        const rootSize      = header.readUInt32()
        const rootOffset2   = header.readUInt32()

        if (fileMagic !== FILE_MAGIC || magic !== ALLOCATOR_MAGIC)
            return DSMetaError.eav('L1_BA_HEADER', 'Bad file or allocator magic.', null, { fileMagic, magic })
        if (rootOffset !== rootOffset2 || rootOffset + PREFIX_SIZE + rootSize > data.length)
            return DSMetaError.eav('L1_BA_HEADER', 'The root block lies outside of the file.', null, { rootOffset, rootOffset2, rootSize, length: data.length })

        try {

            const self = new this()
            self.data = data
            self.addresses = []
            self.toc = new Map()
            self.freeLists = []

            const root = Memory.wrap(data.subarray(rootOffset + PREFIX_SIZE, rootOffset + PREFIX_SIZE + rootSize))

            const count = root.readUInt32()
            root.readUInt32()
            for (let i = 0; i < count; i++) self.addresses.push(root.readUInt32())
            root.read(4 * (this.paddedCount(count) - count))

            const tocCount = root.readUInt32()
            for (let i = 0; i < tocCount; i++) {
                const name = root.readASCII(root.readUInt8())
                self.toc.set(name, root.readUInt32())
            }

            for (let i = 0; i < FREE_LIST_COUNT; i++) {
                const list: number[] = []
                const entries = root.readUInt32()
                for (let j = 0; j < entries; j++) list.push(root.readUInt32())
                self.freeLists.push(list)
            }

            return [null, self]

        }
        catch (error) {
            return DSMetaError.eav('L1_BA_ROOT', null, error as Error, { rootOffset, rootSize })
        }
    }

    /** Returns the contents of a block by its number. */
    public block(blockNumber: number): T.XEav<Buffer, 'L1_BA_BLOCK_RANGE'> {
        const address = this.addresses[blockNumber]
        if (address === undefined) return DSMetaError.eav('L1_BA_BLOCK_RANGE', null, null, { blockNumber, blocks: this.addresses.length })

        const { offset, size } = BuddyAllocator.locate(address)
        const start = offset + PREFIX_SIZE
        if (start >= this.data.length) return DSMetaError.eav('L1_BA_BLOCK_RANGE', 'The block starts past the end of the file.', null, { blockNumber, offset, size })

        return [null, this.data.subarray(start, Math.min(start + size, this.data.length))]
    }

    // Writing ================================================================

    /**
     * Starts a fresh allocator for a new file.
     * Claims space for the header, the superblock (block 1) and the root
     * block (block 0), in that order, so the first B-tree page lands at 0x1000.
     */
    public static create(superblockName: string, superblockSize: number, rootSize: number): BuddyAllocator {

        const self = new this()
        self.data = Buffer.alloc(0)
        self.addresses = [0, 0]
        self.toc = new Map()
        self.freeLists = Array.from({ length: FREE_LIST_COUNT }, () => [])
        self.freeLists[FREE_LIST_COUNT - 1] = [0]

        self.claim(HEADER_SIZE)
        self.addresses[1] = BuddyAllocator.pack(self.claim(superblockSize), superblockSize)
        self.addresses[0] = BuddyAllocator.pack(self.claim(rootSize), rootSize)
        self.toc.set(superblockName, 1)

        return self
    }

    /** Allocates a new block and returns its block number. */
    public allocate(size: number): number {
        const blockSize = BuddyAllocator.blockSizeFor(size)
        this.addresses.push(BuddyAllocator.pack(this.claim(blockSize), blockSize))
        return this.addresses.length - 1
    }

    /**
     * Takes the lowest free offset of the requested size, splitting larger
     * free blocks on the way down and keeping the unused halves (buddies).
     */
    private claim(size: number): number {

        const level = Math.log2(size)
        let from = level
        while (from < FREE_LIST_COUNT && (this.freeLists[from] ?? []).length === 0) from++

        const list = this.freeLists[from]
        const offset = list ? list.shift() : undefined
        if (offset === undefined) throw new RangeError(`No free space left for a block of ${size} bytes.`)

        while (from > level) {
            from--
            const buddies = this.freeLists[from] ?? []
            buddies.push(offset + 2 ** from)
            buddies.sort((a, b) => a - b)
            this.freeLists[from] = buddies
        }

        return offset

    }

    /** Number of bytes the root block needs to describe the current allocations. */
    public rootByteLength(): number {
        let length = 8 + 4 * BuddyAllocator.paddedCount(this.addresses.length) + 4
        for (const [name] of this.toc) length += 1 + name.length + 4
        for (const list of this.freeLists) length += 4 + 4 * list.length
        return length
    }

    /**
     * Assembles the whole file: prefix, header, root block and every block in `blocks`.
     * Blocks without content (including the header area) stay zero-filled.
     */
    public serialize(blocks: Map<number, Buffer>): T.XEav<Buffer, 'L1_BA_SERIALIZE'> {
        try {

            const rootAddress = this.addresses[0] ?? 0
            const rootBlock = BuddyAllocator.locate(rootAddress)
            if (this.rootByteLength() > rootBlock.size) {
                throw new RangeError(`Root block needs ${this.rootByteLength()} bytes but only ${rootBlock.size} were allocated.`)
            }

            const root = Memory.alloc(rootBlock.size)
            root.writeUInt32(this.addresses.length)
            root.writeUInt32(0)
            for (let i = 0; i < BuddyAllocator.paddedCount(this.addresses.length); i++) root.writeUInt32(this.addresses[i] ?? 0)

            root.writeUInt32(this.toc.size)
            for (const [name, blockNumber] of this.toc) {
                root.writeUInt8(name.length)
                root.writeASCII(name)
                root.writeUInt32(blockNumber)
            }

            for (const list of this.freeLists) {
                root.writeUInt32(list.length)
                for (const offset of list) root.writeUInt32(offset)
            }

            const end = Math.max(HEADER_SIZE, ...this.addresses.map(address => {
                const { offset, size } = BuddyAllocator.locate(address)
                return offset + size
            }))

            const file = Memory.alloc(PREFIX_SIZE + end)
            file.writeUInt32(FILE_MAGIC)
            file.writeASCII(ALLOCATOR_MAGIC)
            file.writeUInt32(rootBlock.offset)
            file.writeUInt32(rootBlock.size)
            file.writeUInt32(rootBlock.offset)
            file.write(HEADER_TRAILER)
            file.write(root.buffer, PREFIX_SIZE + rootBlock.offset)

            for (const [blockNumber, data] of blocks) {
                const address = this.addresses[blockNumber]
                if (address === undefined) throw new RangeError(`Block ${blockNumber} was never allocated.`)
                const { offset, size } = BuddyAllocator.locate(address)
                if (data.length > size) throw new RangeError(`Block ${blockNumber} holds ${data.length} bytes but only ${size} were allocated.`)
                file.write(data, PREFIX_SIZE + offset)
            }

            return [null, file.buffer]

        }
        catch (error) {
            return DSMetaError.eav('L1_BA_SERIALIZE', null, error as Error, { blocks: this.addresses.length })
        }
    }

    // Helpers ================================================================

    public static locate(address: number): TBlockLocation {
        const log = address % 32
        return { offset: address - log, size: 2 ** log }
    }

    public static pack(offset: number, size: number): number {
        return offset + Math.log2(size)
    }

    /** Smallest power of two block (at least 32 bytes) that fits `length` bytes. */
    public static blockSizeFor(length: number): number {
        let size = 32
        while (size < length) size *= 2
        return size
    }

    /** Root block size needed for `count` blocks, never below the size used by the system file manager. */
    public static rootSizeFor(count: number): number {
        const worstCase = 8 + 4 * this.paddedCount(count) + 4 + (1 + 4 + 4) + FREE_LIST_COUNT * 8
        return Math.max(C.ROOT_BLOCK_SIZE, this.blockSizeFor(worstCase))
    }

    private static paddedCount(count: number): number {
        return Math.ceil(count / ADDRESS_PAGE) * ADDRESS_PAGE
    }

}
