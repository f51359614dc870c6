import fs from 'node:fs'
import path from 'node:path'
import { describe, test, expect, beforeAll, afterAll } from "vitest"
import EntryCodec, { type TRecord } from '../src/L0/EntryCodec.js'
import BuddyAllocator from '../src/L1/BuddyAllocator.js'
import BTreeStore from '../src/L1/BTreeStore.js'
import { blob, captureLog, record, removeDirectory, useTempDirectory } from './defaults/records.js'

const sorted = (records: TRecord[]) => [...records].sort((a, b) => EntryCodec.compareRecords(a, b))

describe('Buddy allocator', () => {

    test('layout of a new file', () => {

        const allocator = BuddyAllocator.create('DSDB', 32, 2048)
        expect(allocator.allocate(4096)).toBe(2)

        expect(allocator.addresses).toStrictEqual([0x80B, 0x25, 0x100C])
        expect(allocator.toc).toStrictEqual(new Map([['DSDB', 1]]))
        expect(allocator.freeLists[5]).toStrictEqual([])
        expect(allocator.freeLists[6]).toStrictEqual([64])
        expect(allocator.freeLists[10]).toStrictEqual([1024])
        expect(allocator.freeLists[11]).toStrictEqual([])
        expect(allocator.freeLists[12]).toStrictEqual([])
        expect(allocator.freeLists[13]).toStrictEqual([8192])
        expect(allocator.freeLists[30]).toStrictEqual([2 ** 30])
        expect(allocator.freeLists[31]).toStrictEqual([])

    })

    test('splits larger blocks for consecutive allocations', () => {
        const allocator = BuddyAllocator.create('DSDB', 32, 2048)
        const blocks = [allocator.allocate(512), allocator.allocate(512), allocator.allocate(512), allocator.allocate(512)]
        expect(blocks.map(n => BuddyAllocator.locate(allocator.addresses[n] ?? 0).offset)).toStrictEqual([0x200, 0x400, 0x600, 0x1000])
        expect(allocator.freeLists[9]).toStrictEqual([0x1200])
        expect(allocator.freeLists[10]).toStrictEqual([0x1400])
        expect(allocator.freeLists[11]).toStrictEqual([0x1800])
    })

    test('serialize & read', () => {

        const allocator = BuddyAllocator.create('DSDB', 32, 2048)
        const node = allocator.allocate(4096)
        const [error, file] = allocator.serialize(new Map([[node, Buffer.from('node')]]))
        if (error) return expect(error).toBeNull()

        expect(file.length).toBe(4 + 0x2000)
        expect(file.subarray(0, 20).toString('hex')).toBe('00000001' + '42756431' + '00000800' + '00000800' + '00000800')
        expect(file.subarray(20, 36).toString('hex')).toBe('0000100c000000870000200b00000000')

        const [readError, read] = BuddyAllocator.read(file)
        if (readError) return expect(readError).toBeNull()
        expect(read.addresses).toStrictEqual(allocator.addresses)
        expect(read.toc).toStrictEqual(allocator.toc)
        expect(read.freeLists).toStrictEqual(allocator.freeLists)

        const [blockError, block] = read.block(node)
        if (blockError) return expect(blockError).toBeNull()
        expect(block.length).toBe(4096)
        expect(block.subarray(0, 4).toString()).toBe('node')

        expect(read.block(3)[0]?.code).toBe('L1_BA_BLOCK_RANGE')

    })

    test('bad magic', () => {
        const data = Buffer.alloc(64)
        data.writeUInt32BE(1, 0)
        data.write('Bud2', 4, 'latin1')
        expect(BuddyAllocator.read(data)[0]?.code).toBe('L1_BA_HEADER')
    })

})

describe('B-tree store', () => {

    let directory: string
    beforeAll(() => { directory = useTempDirectory('store') })
    afterAll(() => removeDirectory(directory))

    const fileIn = (name: string) => path.join(directory, name)

    test('write & open', () => {

        const file = fileIn('basic')
        const records = [
            record('b', 'cmmt', { type: 'ustr', value: 'second' }),
            record('.', 'vstl', { type: 'type', value: 'Nlsv' }),
            record('A', 'lclr', { type: 'long', value: 2 }),
            record('a', 'Iloc', blob(Buffer.alloc(16))),
            record('a', 'cmmt', { type: 'ustr', value: 'first' }),
        ]

        const error = BTreeStore.write(file, records, { replace: true })
        if (error) return expect(error).toBeNull()

        const [openError, store] = BTreeStore.open(file)
        if (openError) return expect(openError).toBeNull()

        expect(store.size).toBe(5)
        expect(store.superblock).toStrictEqual({ rootNode: 2, levels: 1, records: 5, nodes: 1, pageSize: 4096 })
        expect([...store.entries()]).toStrictEqual(sorted(records))
        expect([...store.allFilenames()]).toStrictEqual(['.', 'A', 'a', 'b'])
        expect([...store.allFilenames()]).toStrictEqual(['.', 'A', 'a', 'b'])
        expect([...store.allCodes('a')]).toStrictEqual(['Iloc', 'cmmt'])
        expect(store.entry('b', 'cmmt')?.value).toStrictEqual({ type: 'ustr', value: 'second' })
        expect(store.entry('b', 'Iloc')).toBeUndefined()

    })

    test('empty store', () => {
        const file = fileIn('empty')
        const error = BTreeStore.create(file).write()
        if (error) return expect(error).toBeNull()

        expect(fs.statSync(file).size).toBe(4 + 0x2000)

        const [openError, store] = BTreeStore.open(file)
        if (openError) return expect(openError).toBeNull()
        expect(store.size).toBe(0)
        expect([...store.allFilenames()]).toStrictEqual([])
    })

    test('two-level tree layout', () => {

        const records = Array.from({ length: 10 }, (_, i) => record(`f0${i}`, 'cmmt', blob(Buffer.alloc(90, i))))

        const [error, data] = BTreeStore.serialize(records, 512)
        if (error) return expect(error).toBeNull()

        const [parseError, parsed] = BTreeStore.parse(data)
        if (parseError) return expect(parseError).toBeNull()

        expect(parsed.superblock).toStrictEqual({ rootNode: 5, levels: 2, records: 10, nodes: 4, pageSize: 512 })
        expect(sorted(parsed.records)).toStrictEqual(records)

    })

    test('internal pages keep a separator when the last leaf follows a full page', () => {

        // Six leaves: the first internal page fills after four separators.
        const records = Array.from({ length: 26 }, (_, i) => record(`f${String(i).padStart(2, '0')}`, 'cmmt', blob(Buffer.alloc(90, i))))

        const [error, data] = BTreeStore.serialize(records, 512)
        if (error) return expect(error).toBeNull()

        const [parseError, parsed] = BTreeStore.parse(data)
        if (parseError) return expect(parseError).toBeNull()
        expect(parsed.superblock).toStrictEqual({ rootNode: 10, levels: 3, records: 26, nodes: 9, pageSize: 512 })
        expect(sorted(parsed.records)).toStrictEqual(records)

        const [readError, allocator] = BuddyAllocator.read(data)
        if (readError) return expect(readError).toBeNull()

        const internalCounts: number[] = []
        for (let block = 2; block <= 10; block++) {
            const [blockError, node] = allocator.block(block)
            if (blockError) return expect(blockError).toBeNull()
            if (node.readUInt32BE(0) !== 0) internalCounts.push(node.readUInt32BE(4))
        }
        expect(internalCounts).toStrictEqual([3, 1, 1])

    })

    test('many records span several levels', () => {

        const file = fileIn('large')
        const records = Array.from({ length: 2000 }, (_, i) => record(`item-${String(i).padStart(4, '0')}`, 'Iloc', blob(Buffer.alloc(100, i % 256))))

        const error = BTreeStore.write(file, records, { replace: true })
        if (error) return expect(error).toBeNull()

        const [openError, store] = BTreeStore.open(file)
        if (openError) return expect(openError).toBeNull()

        expect(store.size).toBe(2000)
        expect(store.superblock?.records).toBe(2000)
        expect(store.superblock?.levels).toBeGreaterThan(2)
        expect([...store.entries()]).toStrictEqual(records)

    })

    test('merge vs replace', () => {

        const file = fileIn('merge')
        const a = record('a', 'cmmt', { type: 'ustr', value: 'a' })
        const b = record('b', 'cmmt', { type: 'ustr', value: 'b' })
        const c = record('c', 'cmmt', { type: 'ustr', value: 'c' })

        expect(BTreeStore.write(file, [a], { replace: true })).toBeUndefined()
        expect(BTreeStore.write(file, [b])).toBeUndefined()

        const [mergedError, merged] = BTreeStore.open(file)
        if (mergedError) return expect(mergedError).toBeNull()
        expect([...merged.entries()]).toStrictEqual([a, b])

        expect(BTreeStore.write(file, [c], { replace: true })).toBeUndefined()
        const [replacedError, replaced] = BTreeStore.open(file)
        if (replacedError) return expect(replacedError).toBeNull()
        expect([...replaced.entries()]).toStrictEqual([c])

    })

    test('mutation', () => {

        const store = BTreeStore.create(fileIn('unused'))
        store.setEntry(record('x', 'cmmt', { type: 'ustr', value: 'one' }))
        store.setEntry(record('x', 'cmmt', { type: 'ustr', value: 'two' }))
        store.setEntry(record('x', 'lclr', { type: 'long', value: 1 }))
        store.setEntry(record('y', 'lclr', { type: 'long', value: 3 }))

        expect(store.size).toBe(3)
        expect(store.entry('x', 'cmmt')?.value).toStrictEqual({ type: 'ustr', value: 'two' })

        expect(store.removeEntry('y', 'lclr')).toBe(true)
        expect(store.removeEntry('y', 'lclr')).toBe(false)
        expect(store.removeAllEntries('x')).toBe(2)
        expect(store.size).toBe(0)

        store.apply({
            set: [record('z', 'cmmt', { type: 'ustr', value: 'z' })],
            remove: [{ filename: 'z', code: 'lclr' }],
        })
        expect([...store.allFilenames()]).toStrictEqual(['z'])

    })

    test('missing file', () => {
        const [error] = BTreeStore.open(fileIn('does-not-exist'))
        expect(error?.code).toBe('L1_ST_NOT_FOUND')
    })

    test('unreadable path', () => {
        const [error] = BTreeStore.open(directory)
        expect(error?.code).toBe('L1_ST_READ')
    })

    test('garbage and truncated files are corrupt', () => {

        const garbage = fileIn('garbage')
        fs.writeFileSync(garbage, 'this is not a metadata file')
        expect(BTreeStore.open(garbage)[0]?.code).toBe('L1_ST_CORRUPT')

        const truncated = fileIn('truncated')
        expect(BTreeStore.write(truncated, [record('a', 'cmmt', { type: 'ustr', value: 'a' })], { replace: true })).toBeUndefined()
        fs.writeFileSync(truncated, fs.readFileSync(truncated).subarray(0, 0x900))
        expect(BTreeStore.open(truncated)[0]?.code).toBe('L1_ST_CORRUPT')

    })

    test('node cycles are corrupt', () => {

        const file = fileIn('cycle')
        expect(BTreeStore.write(file, [], { replace: true })).toBeUndefined()

        // Make the only node an internal node whose rightmost child is itself.
        const data = fs.readFileSync(file)
        data.writeUInt32BE(2, 4 + 0x1000)
        fs.writeFileSync(file, data)

        const [error] = BTreeStore.open(file)
        expect(error?.code).toBe('L1_ST_CORRUPT')
        expect(error?.causes[0]).toMatchObject({ code: 'L1_ST_NODE_CYCLE' })

    })

    test('malformed record skips the rest of its node', () => {

        const file = fileIn('malformed')
        const first = record('a', 'cmmt', { type: 'ustr', value: 'x' })
        expect(BTreeStore.write(file, [
            first,
            record('b', 'Iloc', blob(Buffer.alloc(16))),
            record('c', 'cmmt', { type: 'ustr', value: 'y' }),
        ], { replace: true })).toBeUndefined()

        // Node header (8) + first record (20) + filename length, name, code and type (14).
        const data = fs.readFileSync(file)
        data.writeUInt32BE(0xFFFFFF, 4 + 0x1000 + 8 + 20 + 14)
        fs.writeFileSync(file, data)

        const { lines, config } = captureLog('warn')
        const [error, store] = BTreeStore.open(file, config)
        if (error) return expect(error).toBeNull()

        expect([...store.entries()]).toStrictEqual([first])
        expect(lines).toHaveLength(1)
        expect(lines[0]).toContain('Skipping malformed record and the remainder of its node.')

    })

    test('unknown value type is corrupt', () => {

        const file = fileIn('unknown-type')
        expect(BTreeStore.write(file, [record('a', 'cmmt', { type: 'ustr', value: 'x' })], { replace: true })).toBeUndefined()

        const data = fs.readFileSync(file)
        data.write('zzzz', 4 + 0x1000 + 8 + 10, 'latin1')
        fs.writeFileSync(file, data)

        expect(BTreeStore.open(file)[0]?.code).toBe('L1_ST_CORRUPT')

    })

    test('oversized record', () => {
        const error = BTreeStore.write(fileIn('oversized'), [record('a', 'bigd', blob(Buffer.alloc(5000)))], { replace: true })
        expect(error?.code).toBe('L1_ST_RECORD_TOO_LARGE')
        expect(fs.existsSync(fileIn('oversized'))).toBe(false)
    })

    test('failed write leaves no temporary file', () => {

        const target = fileIn('occupied')
        fs.mkdirSync(target)
        fs.writeFileSync(path.join(target, 'keep'), 'x')

        const error = BTreeStore.write(target, [record('a', 'cmmt', { type: 'ustr', value: 'a' })], { replace: true })
        expect(error?.code).toBe('L1_ST_WRITE')
        expect(fs.readdirSync(directory).filter(name => name.endsWith('.tmp'))).toStrictEqual([])
        expect(fs.readdirSync(target)).toStrictEqual(['keep'])

    })

    test('merging into an unreadable file fails', () => {
        const error = BTreeStore.write(fileIn('occupied'), [record('a', 'cmmt', { type: 'ustr', value: 'a' })])
        expect(error?.code).toBe('L1_ST_WRITE')
    })

})
