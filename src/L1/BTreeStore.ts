// Imports =============================================================================================================

import fs from 'node:fs'
import path from 'node:path'
import crypto from 'node:crypto'

import type * as T from '../../types.js'
import DSMetaError from '../errors/DSMetaError.js'
import Config from '../Config.js'
import Log from '../misc/log.js'
import Memory from '../L0/Memory.js'
import EntryCodec, { type TRecord, type TRecordKey } from '../L0/EntryCodec.js'
import BuddyAllocator from './BuddyAllocator.js'

// Types ===============================================================================================================

export interface TSuperblock {
    /** Block number of the B-tree root node             */ rootNode:   number
    /** Number of levels (1: the root is a leaf)         */ levels:     number
    /** Total number of records                          */ records:    number
    /** Total number of nodes                            */ nodes:      number
    /** Page size of the tree's nodes                    */ pageSize:   number
}

/** Read-only view over a record set, implemented by the store. */
export interface TRecordSource {
    allFilenames(): Iterable<string>
    allCodes(filename: string): Iterable<string>
    entry(filename: string, code: string): TRecord | undefined
}

export interface TChangeSet {
    /** Records to insert or overwrite                   */ set:        TRecord[]
    /** Keys of records to delete                        */ remove:     TRecordKey[]
}

export interface TWriteOptions {
    /**
     * Writes the records as the complete content of the file.
     * By default the records are merged into whatever the file already holds.
     */
    replace?: boolean
}

interface TNode {
    /** Rightmost child (0 for leaves)                   */ next:       number
    /** Child blocks, one per record (internal nodes)    */ children:   number[]
    /** Encoded records                                  */ records:    Buffer[]
}

interface TLevelItem {
    /** Block number of the subtree                      */ block:      number
    /** Encoded record following the subtree, if any     */ separator?: Buffer
}

type TOpenCode = 'L1_ST_NOT_FOUND' | 'L1_ST_CORRUPT' | 'L1_ST_READ'
type TSerializeCode = 'L1_ST_SERIALIZE' | 'L1_ST_RECORD_TOO_LARGE'

// Exports =============================================================================================================

const SUPERBLOCK_NAME = 'DSDB'
const SUPERBLOCK_SIZE = 32
const NODE_HEADER_SIZE = 8
const CHILD_POINTER_SIZE = 4

const keyOf = (filename: string, code: string) => `${filename}\u0000${code}`

/**
 * Keyed record container stored as a B-tree inside a buddy-allocated file.
 *
 * Superblock ("DSDB"):
 *
    Index | Size | Type   | Description
    ------|------|--------|------------------------------------------------
    0     | 4B   | UInt32 | Root node block number
    4     | 4B   | UInt32 | Number of levels
    8     | 4B   | UInt32 | Number of records
    12    | 4B   | UInt32 | Number of nodes
    16    | 4B   | UInt32 | Page size
 *
 * Node:
 *
    Index | Size | Type   | Description
    ------|------|--------|------------------------------------------------
    0     | 4B   | UInt32 | Rightmost child block (0: leaf node)
    4     | 4B   | UInt32 | Record count (N)
    8     | *    | *      | Leaf: N records, internal: N (child UInt32, record) pairs
 *
 * The whole record set is held in memory while the store is open.
 * Records are kept unique by (filename, code) and enumerated in sorted order.
 */
export default class BTreeStore implements TRecordSource {

    // Internal ===============================================================

    /** Location the store was opened from (and writes to by default). */
    public declare readonly path: string
    /** Structure of the tree as found on disk, if the store was read from a file. */
    public declare readonly superblock?: TSuperblock

    private declare records: Map<string, TRecord>
    private declare sorted?: TRecord[]
    private declare config: Config

    private constructor(file: string, config: Config, superblock?: TSuperblock) {
        this.path = file
        this.config = config
        this.records = new Map()
        this.superblock = superblock
    }

    // Lifecycle ==============================================================

    /** Creates an empty in-memory store that writes to `file`. */
    public static create(file: string, config = Config.defaults()): BTreeStore {
        return new this(file, config)
    }

    /**
     * Opens and fully reads the file at `file`.
     * A missing file yields `L1_ST_NOT_FOUND`, an unreadable one `L1_ST_READ`
     * and a structurally invalid one `L1_ST_CORRUPT`.
     */
    public static open(file: string, config = Config.defaults()): T.XEav<BTreeStore, TOpenCode> {

        let data: Buffer
        try {
            data = fs.readFileSync(file)
        }
        catch (error) {
            const code = error instanceof Error && 'code' in error ? error.code : undefined
            if (code === 'ENOENT' || code === 'ENOTDIR') return DSMetaError.eav('L1_ST_NOT_FOUND', null, error as Error, { file })
            return DSMetaError.eav('L1_ST_READ', null, error as Error, { file })
        }

        const log = config.logger('store')
        const [parseError, parsed] = this.parse(data, log)
        if (parseError) return DSMetaError.eav('L1_ST_CORRUPT', null, parseError, { file })

        const self = new this(file, config, parsed.superblock)
        for (const record of parsed.records) self.setEntry(record)

        if (parsed.superblock.records !== self.records.size) {
            log.debug('Record count differs from the superblock.', { file, declared: parsed.superblock.records, found: self.records.size })
        }

        return [null, self]

    }

    // Parsing ================================================================

    /**
     * Parses the raw content of a metadata file.
     * Records that fail to decode are skipped together with the rest of their node.
     */
    public static parse(data: Buffer, log = new Log('store')): T.XEav<{ superblock: TSuperblock, records: TRecord[] }, 'L1_ST_CORRUPT' | 'L1_ST_NODE_CYCLE'> {

        const [allocError, allocator] = BuddyAllocator.read(data)
        if (allocError) return DSMetaError.eav('L1_ST_CORRUPT', null, allocError)

        const superblockNumber = allocator.toc.get(SUPERBLOCK_NAME)
        if (superblockNumber === undefined) return DSMetaError.eav('L1_ST_CORRUPT', `Missing "${SUPERBLOCK_NAME}" table of contents entry.`, null, { toc: [...allocator.toc.keys()].join(',') })

        const [blockError, block] = allocator.block(superblockNumber)
        if (blockError) return DSMetaError.eav('L1_ST_CORRUPT', null, blockError)

        let superblock: TSuperblock
        try {
            const mem = Memory.wrap(block)
            superblock = {
                rootNode:   mem.readUInt32(),
                levels:     mem.readUInt32(),
                records:    mem.readUInt32(),
                nodes:      mem.readUInt32(),
                pageSize:   mem.readUInt32(),
            }
        }
        catch (error) {
            return DSMetaError.eav('L1_ST_CORRUPT', 'The superblock is truncated.', error as Error)
        }

        const records: TRecord[] = []
        const visited = new Set<number>()
        const pending = [superblock.rootNode]

        while (pending.length > 0) {

            const blockNumber = pending.pop() ?? 0
            if (visited.has(blockNumber)) return DSMetaError.eav('L1_ST_NODE_CYCLE', null, null, { blockNumber })
            visited.add(blockNumber)

            const [nodeError, node] = allocator.block(blockNumber)
            if (nodeError) return DSMetaError.eav('L1_ST_CORRUPT', null, nodeError)

            let next: number
            let count: number
            try {
                next = node.readUInt32BE(0)
                count = node.readUInt32BE(4)
            }
            catch (error) {
                return DSMetaError.eav('L1_ST_CORRUPT', 'A B-tree node is truncated.', error as Error, { blockNumber })
            }

            let offset = NODE_HEADER_SIZE
            for (let i = 0; i < count; i++) {

                if (next !== 0) {
                    if (offset + CHILD_POINTER_SIZE > node.length) {
                        log.warn('B-tree node ends before its declared record count.', { blockNumber, declared: count, read: i })
                        break
                    }
                    pending.push(node.readUInt32BE(offset))
                    offset += CHILD_POINTER_SIZE
                }

                const [recordError, decoded] = EntryCodec.decodeRecord(node, offset)
                if (recordError) {
                    if (recordError.code === 'L0_EC_UNKNOWN_TYPE') {
                        return DSMetaError.eav('L1_ST_CORRUPT', 'A record carries an unknown value type.', recordError, { blockNumber })
                    }
                    log.warn('Skipping malformed record and the remainder of its node.', { blockNumber, index: i, declared: count })
                    break
                }

                records.push(decoded.value)
                offset += decoded.length

            }

            if (next !== 0) pending.push(next)

        }

        return [null, { superblock, records }]

    }

    // Accessors ==============================================================

    /** Records in (filename, code) order. */
    public *entries(): Generator<TRecord> {
        if (!this.sorted) this.sorted = [...this.records.values()].sort((a, b) => EntryCodec.compareRecords(a, b))
        yield* this.sorted
    }

    /** Distinct filenames in sorted order. Every call starts a new enumeration. */
    public *allFilenames(): Generator<string> {
        let last: string | undefined
        for (const record of this.entries()) {
            if (record.filename !== last) yield record.filename
            last = record.filename
        }
    }

    /** Codes recorded for `filename`, in byte order. */
    public *allCodes(filename: string): Generator<string> {
        for (const record of this.entries()) {
            if (record.filename === filename) yield record.code
        }
    }

    public entry(filename: string, code: string): TRecord | undefined {
        return this.records.get(keyOf(filename, code))
    }

    public get size() {
        return this.records.size
    }

    // Mutation ===============================================================

    /** Inserts a record or replaces the one stored under the same (filename, code). */
    public setEntry(record: TRecord): void {
        this.records.set(keyOf(record.filename, record.code), record)
        this.sorted = undefined
    }

    /** Removes a record, returning whether it existed. */
    public removeEntry(filename: string, code: string): boolean {
        const removed = this.records.delete(keyOf(filename, code))
        if (removed) this.sorted = undefined
        return removed
    }

    /** Removes every record of `filename`, returning the number removed. */
    public removeAllEntries(filename: string): number {
        let removed = 0
        for (const [key, record] of this.records) {
            if (record.filename === filename && this.records.delete(key)) removed++
        }
        if (removed > 0) this.sorted = undefined
        return removed
    }

    public apply(changes: TChangeSet): void {
        for (const key of changes.remove) this.removeEntry(key.filename, key.code)
        for (const record of changes.set) this.setEntry(record)
    }

    // Writing ================================================================

    /** Writes the store's current record set to `file` (the path it was opened from by default). */
    public write(file = this.path): T.XEavS<'L1_ST_WRITE' | TSerializeCode> {
        return BTreeStore.write(file, [...this.entries()], { replace: true }, this.config)
    }

    /**
     * Writes `records` into `file`, atomically replacing it.
     * Unless `replace` is set, the records are merged over the file's existing content.
     * An unreadable existing file is treated as empty.
     */
    public static write(file: string, records: Iterable<TRecord>, options: TWriteOptions = {}, config = Config.defaults()): T.XEavS<'L1_ST_WRITE' | TSerializeCode> {

        const log = config.logger('store')
        let store = this.create(file, config)

        if (!options.replace) {
            const [openError, existing] = this.open(file, config)
            if (!openError) store = existing
            else if (openError.code === 'L1_ST_READ') return new DSMetaError('L1_ST_WRITE', 'The existing metadata file could not be read for merging.', openError, { file })
            else if (openError.code === 'L1_ST_CORRUPT') log.warn('Existing metadata file is corrupt and will be replaced.', { file, reason: openError.rootCause?.message })
        }

        for (const record of records) store.setEntry(record)

        const [serializeError, data] = this.serialize([...store.entries()], config.pageSize)
        if (serializeError) return serializeError

        return this.replaceFile(file, data, log)

    }

    /** Writes `data` to a temporary sibling file and renames it over `file`. */
    private static replaceFile(file: string, data: Buffer, log: Log): T.XEavS<'L1_ST_WRITE'> {

        const temp = path.join(path.dirname(file), `.${path.basename(file)}.${crypto.randomBytes(6).toString('hex')}.tmp`)

        try {
            fs.writeFileSync(temp, data)
            fs.renameSync(temp, file)
            log.debug('Wrote metadata file.', { file, bytes: data.length })
        }
        catch (error) {
            try {
                if (fs.existsSync(temp)) fs.unlinkSync(temp)
            }
            catch (cleanupError) {
                log.warn('Failed to remove temporary file.', { temp, reason: (cleanupError as Error).message })
            }
            return new DSMetaError('L1_ST_WRITE', null, error as Error, { file })
        }

    }

    // Serialization ==========================================================

    /**
     * Serializes a sorted record set into the bytes of a complete file.
     * Records are packed into pages leaf-first; when a leaf is full the next
     * record moves up a level as the separator between it and the next leaf.
     */
    public static serialize(records: TRecord[], pageSize: number): T.XEav<Buffer, TSerializeCode | 'L1_ST_SERIALIZE'> {

        const encoded: Buffer[] = []
        for (const record of records) {
            const [error, data] = EntryCodec.encodeRecord(record)
            if (error) return DSMetaError.eav('L1_ST_SERIALIZE', null, error, { filename: record.filename, code: record.code })
            if (NODE_HEADER_SIZE + CHILD_POINTER_SIZE + data.length > pageSize) {
                return DSMetaError.eav('L1_ST_RECORD_TOO_LARGE', null, null, { filename: record.filename, code: record.code, bytes: data.length, pageSize })
            }
            encoded.push(data)
        }

        const nodes: TNode[] = []
        let levels = 1
        let level = this.packLeaves(encoded, pageSize, nodes)
        while (level.length > 1) {
            level = this.packInternal(level, pageSize, nodes)
            levels++
        }

        try {

            const allocator = BuddyAllocator.create(SUPERBLOCK_NAME, SUPERBLOCK_SIZE, BuddyAllocator.rootSizeFor(2 + nodes.length))
            const blocks = new Map<number, Buffer>()

            // Node indexes are shifted by 2: blocks 0 and 1 hold the root block and the superblock.
            for (const node of nodes) {
                const blockNumber = allocator.allocate(pageSize)
                blocks.set(blockNumber, this.serializeNode(node, pageSize))
            }

            const superblock = Memory.alloc(SUPERBLOCK_SIZE)
            superblock.writeUInt32(level[0]?.block ?? 2)
            superblock.writeUInt32(levels)
            superblock.writeUInt32(records.length)
            superblock.writeUInt32(nodes.length)
            superblock.writeUInt32(pageSize)
            blocks.set(1, superblock.buffer)

            const [allocError, file] = allocator.serialize(blocks)
            if (allocError) return DSMetaError.eav('L1_ST_SERIALIZE', null, allocError)

            return [null, file]

        }
        catch (error) {
            return DSMetaError.eav('L1_ST_SERIALIZE', null, error as Error, { records: records.length, nodes: nodes.length })
        }
    }

    private static serializeNode(node: TNode, pageSize: number): Buffer {
        const mem = Memory.alloc(pageSize)
        mem.writeUInt32(node.next)
        mem.writeUInt32(node.records.length)
        node.records.forEach((record, i) => {
            if (node.next !== 0) mem.writeUInt32(node.children[i] ?? 0)
            mem.write(record)
        })
        return mem.buffer
    }

    /** Creates a node and returns the block number it will be written to. */
    private static addNode(nodes: TNode[], node: TNode): number {
        nodes.push(node)
        return nodes.length + 1
    }

    private static packLeaves(records: Buffer[], pageSize: number, nodes: TNode[]): TLevelItem[] {

        const items: TLevelItem[] = []
        let current: Buffer[] = []
        let used = NODE_HEADER_SIZE

        for (let i = 0; i < records.length; i++) {

            const record = records[i] ?? Buffer.alloc(0)

            if (used + record.length <= pageSize || current.length === 0) {
                current.push(record)
                used += record.length
                continue
            }

            // The page is full: this record becomes a separator, unless it is the
            // last one, in which case it starts the next leaf and the previous
            // page gives up its last record as the separator instead.
            if (i === records.length - 1) {
                const separator = current.pop()
                items.push({ block: this.addNode(nodes, { next: 0, children: [], records: current }), separator })
                current = [record]
                used = NODE_HEADER_SIZE + record.length
                continue
            }

            items.push({ block: this.addNode(nodes, { next: 0, children: [], records: current }), separator: record })
            current = []
            used = NODE_HEADER_SIZE

        }

        items.push({ block: this.addNode(nodes, { next: 0, children: [], records: current }) })
        return items

    }

    private static packInternal(items: TLevelItem[], pageSize: number, nodes: TNode[]): TLevelItem[] {

        const parents: TLevelItem[] = []
        let children: number[] = []
        let separators: Buffer[] = []
        let used = NODE_HEADER_SIZE

        for (let i = 0; i < items.length; i++) {

            const item = items[i]
            if (!item) continue

            // The last item always becomes the rightmost child of the last node.
            if (!item.separator) {
                parents.push({ block: this.addNode(nodes, { next: item.block, children, records: separators }) })
                break
            }

            const cost = CHILD_POINTER_SIZE + item.separator.length
            if (used + cost <= pageSize || separators.length === 0) {
                children.push(item.block)
                separators.push(item.separator)
                used += cost
                continue
            }

            // The page is full. When only the last item would follow, the page
            // gives up its own last entry so that the final page keeps a separator.
            if (i === items.length - 2 && separators.length > 1) {
                const child = children.pop() ?? 0
                const separator = separators.pop()
                parents.push({ block: this.addNode(nodes, { next: child, children, records: separators }), separator })
                children = [item.block]
                separators = [item.separator]
                used = NODE_HEADER_SIZE + cost
                continue
            }

            // Otherwise the item's subtree closes it as the rightmost child and
            // its separator moves up a level.
            parents.push({ block: this.addNode(nodes, { next: item.block, children, records: separators }), separator: item.separator })
            children = []
            separators = []
            used = NODE_HEADER_SIZE

        }

        return parents

    }

}
