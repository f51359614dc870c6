import fs from 'node:fs'
import path from 'node:path'
import { describe, test, expect, beforeAll, afterAll } from "vitest"
import EntryCodec, { type TRecord } from '../src/L0/EntryCodec.js'
import { PlistReal } from '../src/L0/Plist.js'
import SemanticDecoder from '../src/L2/SemanticDecoder.js'
import { contentRectToHostFrame } from '../src/L2/Coordinates.js'
import { visibleColumns } from '../src/L2/DirectoryMetadata.js'
import { blob, captureLog, iloc, plist, record, removeDirectory, storeOf, useTempDirectory } from './defaults/records.js'

const fwi0 = (top: number, left: number, bottom: number, right: number, view = 'icnv') => {
    const data = Buffer.alloc(16)
    data.writeInt16BE(top, 0)
    data.writeInt16BE(left, 2)
    data.writeInt16BE(bottom, 4)
    data.writeInt16BE(right, 6)
    data.write(view, 8, 'latin1')
    return data
}

const icv4 = (size: number, arrangement: string, label: string) => {
    const data = Buffer.alloc(26)
    data.write('icv4', 0, 'latin1')
    data.writeUInt16BE(size, 4)
    data.write(arrangement, 6, 'latin1')
    data.write(label, 10, 'latin1')
    return data
}

const icvo = (size: number, arrangement: string) => {
    const data = Buffer.alloc(18)
    data.write('icvo', 0, 'latin1')
    data.writeUInt16BE(size, 12)
    data.write(arrangement, 14, 'latin1')
    return data
}

const dir = (code: string, data: Buffer) => record('.', code, blob(data))

describe('Semantic decoder', () => {

    let directory: string
    beforeAll(() => { directory = useTempDirectory('decoder') })
    afterAll(() => removeDirectory(directory))

    const decode = (records: TRecord[], config = captureLog().config) =>
        new SemanticDecoder(storeOf(records), { directory, config }).decode()

    // Scenarios ==============================================================

    test('view style', () => {
        expect(decode([record('.', 'vstl', { type: 'type', value: 'Nlsv' })]).viewStyle).toBe('List')
        expect(decode([record('.', 'vstl', { type: 'type', value: 'clmv' })]).viewStyle).toBe('Column')
        expect(decode([record('.', 'vstl', { type: 'type', value: 'zzzz' })]).viewStyle).toBeUndefined()
    })

    test('icon position', () => {
        const metadata = decode([record('file.txt', 'Iloc', blob(iloc(100, 50)))])
        expect(metadata.icons.get('file.txt')).toStrictEqual({ filename: 'file.txt', position: { x: 100, y: 50 } })
    })

    test('legacy window rectangle', () => {
        const metadata = decode([dir('fwi0', fwi0(10, 20, 210, 420))])
        expect(metadata.windowFrame).toStrictEqual({ x: 20, y: 10, width: 400, height: 200 })
        if (!metadata.windowFrame) return
        expect(contentRectToHostFrame(metadata.windowFrame, 800).y).toBe(590)
    })

    test('legacy color background', () => {
        const color = Buffer.concat([Buffer.from('ClrB', 'latin1'), Buffer.from([0xFF, 0xFF, 0x80, 0x00, 0x00, 0x00, 0x00, 0x00])])
        const metadata = decode([dir('BKGD', color)])
        expect(metadata.background.type).toBe('Color')
        expect(metadata.background.color?.red).toBe(1)
        expect(metadata.background.color?.green).toBeCloseTo(0.5, 4)
        expect(metadata.background.color?.blue).toBe(0)
    })

    test('nothing recorded', () => {
        const metadata = decode([])
        expect(metadata.loaded).toBe(true)
        expect(metadata.windowFrame).toBeUndefined()
        expect(metadata.viewStyle).toBeUndefined()
        expect(metadata.iconView).toStrictEqual({})
        expect(metadata.background).toStrictEqual({ type: 'Default' })
        expect(metadata.icons.size).toBe(0)
    })

    // Window =================================================================

    test('window settings take precedence over the legacy rectangle', () => {
        const metadata = decode([
            dir('bwsp', plist({ WindowBounds: '{{5, 6}, {700, 500}}', SidebarWidth: 200, ShowSidebar: true, ShowToolbar: false })),
            dir('fwi0', fwi0(10, 20, 210, 420)),
            record('.', 'fwsw', { type: 'long', value: 150 }),
        ])
        expect(metadata.windowFrame).toStrictEqual({ x: 5, y: 6, width: 700, height: 500 })
        expect(metadata.sidebarWidth).toBe(200)
        expect(metadata.chrome.showSidebar).toBe(true)
        expect(metadata.chrome.showToolbar).toBe(false)
        expect(metadata.chrome.showPathBar).toBeUndefined()
    })

    test('degenerate bounds fall back to the legacy rectangle', () => {
        const metadata = decode([
            dir('bwsp', plist({ WindowBounds: '{{5, 6}, {0, 500}}' })),
            dir('fwi0', fwi0(10, 20, 210, 420)),
            record('.', 'fwsw', { type: 'long', value: 150 }),
        ])
        expect(metadata.windowFrame).toStrictEqual({ x: 20, y: 10, width: 400, height: 200 })
        expect(metadata.sidebarWidth).toBe(150)
    })

    test('short legacy rectangle is ignored', () => {
        expect(decode([dir('fwi0', fwi0(10, 20, 210, 420).subarray(0, 12))]).windowFrame).toBeUndefined()
    })

    // Icon view ==============================================================

    test('icon view settings take precedence over the legacy record', () => {
        const view = decode([
            dir('icvp', plist({ iconSize: new PlistReal(64), arrangeBy: 'grid', labelOnBottom: false, gridSpacing: new PlistReal(54), textSize: 12, showItemInfo: true })),
            dir('icvo', icv4(32, 'none', 'botm')),
        ]).iconView
        expect(view).toStrictEqual({
            iconSize: 64,
            arrangement: 'Grid',
            labelPosition: 'Right',
            gridSpacing: 54,
            textSize: 12,
            showItemInfo: true,
            showIconPreview: undefined,
        })
    })

    test('legacy record fills what the settings leave unset', () => {
        const view = decode([
            dir('icvp', plist({ iconSize: 0, arrangeBy: 'dateModified' })),
            dir('icvo', icv4(48, 'grid', 'botm')),
        ]).iconView
        expect(view.iconSize).toBe(48)
        expect(view.arrangement).toBe('Grid')
        expect(view.labelPosition).toBe('Bottom')
    })

    test('oldest legacy layout', () => {
        const view = decode([dir('icvo', icvo(72, 'none'))]).iconView
        expect(view.iconSize).toBe(72)
        expect(view.arrangement).toBe('None')
        expect(view.labelPosition).toBeUndefined()
    })

    test('diagnostic records are logged', () => {
        const { lines, config } = captureLog()
        decode([dir('icgo', Buffer.from('0000000000000004', 'hex')), dir('icsp', Buffer.alloc(8))], config)
        expect(lines.filter(line => line.includes('Icon view diagnostic record.'))).toHaveLength(2)
        expect(lines.some(line => line.includes('0000000000000004'))).toBe(true)
    })

    // Background =============================================================

    test('color background from the icon view settings', () => {
        const background = decode([dir('icvp', plist({
            backgroundType: 1,
            backgroundColorRed: new PlistReal(0.25),
            backgroundColorGreen: new PlistReal(0.5),
            backgroundColorBlue: new PlistReal(1),
        }))]).background
        expect(background).toStrictEqual({ type: 'Color', color: { red: 0.25, green: 0.5, blue: 1 } })
    })

    test('picture background from an alias', () => {

        const image = path.join(directory, 'sky.png')
        fs.writeFileSync(image, 'png')
        const alias = Buffer.concat([Buffer.alloc(40), Buffer.from(image, 'utf-8'), Buffer.alloc(160)])

        const background = decode([dir('icvp', plist({ backgroundType: 2, backgroundImageAlias: alias }))]).background
        expect(background).toStrictEqual({ type: 'Picture', imagePath: image, color: undefined })

    })

    test('unresolved alias falls back to the recorded color', () => {

        const { lines, config } = captureLog('warn')
        const background = decode([dir('icvp', plist({
            backgroundType: 2,
            backgroundImageAlias: Buffer.alloc(20),
            backgroundColorRed: 1,
            backgroundColorGreen: 0,
            backgroundColorBlue: 0,
        }))], config).background

        expect(background).toStrictEqual({ type: 'Color', color: { red: 1, green: 0, blue: 0 } })
        expect(lines).toHaveLength(1)
        expect(lines[0]).toContain('Background image alias could not be resolved.')

    })

    test('legacy background is authoritative', () => {
        const background = decode([
            dir('icvp', plist({ backgroundType: 1, backgroundColorRed: 1, backgroundColorGreen: 1, backgroundColorBlue: 1 })),
            dir('BKGD', Buffer.from('DefB00000000', 'latin1')),
        ]).background
        expect(background).toStrictEqual({ type: 'Default' })
    })

    test('legacy picture background', () => {
        const background = decode([
            dir('BKGD', Buffer.concat([Buffer.from('PctB', 'latin1'), Buffer.alloc(8)])),
            record('.', 'pict', { type: 'ustr', value: '.background/sky.png' }),
        ]).background
        expect(background).toStrictEqual({ type: 'Picture', imagePath: path.join(directory, '.background', 'sky.png') })
    })

    test('legacy picture without a picture record', () => {
        const { lines, config } = captureLog('warn')
        const background = decode([dir('BKGD', Buffer.concat([Buffer.from('PctB', 'latin1'), Buffer.alloc(8)]))], config).background
        expect(background).toStrictEqual({ type: 'Default' })
        expect(lines[0]).toContain('Legacy background picture could not be resolved.')
    })

    // List view ==============================================================

    test('list view settings with column dictionary', () => {
        const list = decode([dir('lsvp', plist({
            textSize: 13,
            iconSize: new PlistReal(16),
            sortColumn: 'dateModified',
            columns: {
                name: { width: 300, visible: true, ascending: true },
                dateModified: { width: 181, visible: true, ascending: false },
                size: { width: 97, visible: false },
            },
        }))]).listView
        expect(list).toStrictEqual({
            textSize: 13,
            iconSize: 16,
            sortColumn: 'dateModified',
            sortAscending: false,
            columnWidths: { name: 300, dateModified: 181, size: 97 },
            columnVisible: { name: true, dateModified: true, size: false },
        })
    })

    test('alternate list view settings with column array', () => {
        const list = decode([dir('lsvP', plist({
            sortColumn: 'name',
            columns: [
                { identifier: 'name', width: 250, visible: true, ascending: true },
                { identifier: 'kind', width: 120, visible: 0 },
                { width: 50 },
            ],
        }))]).listView
        expect(list.sortAscending).toBe(true)
        expect(list.columnWidths).toStrictEqual({ name: 250, kind: 120 })
        expect(list.columnVisible).toStrictEqual({ name: true, kind: false })
    })

    test('sort key, relative dates and visible columns', () => {
        const metadata = decode([
            record('.', 'GRP0', { type: 'ustr', value: 'kind' }),
            dir('lsvp', plist({ useRelativeDates: 0, columns: { name: { visible: true }, size: { visible: false }, kind: { visible: 1 } } })),
        ])
        expect(metadata.sortBy).toBe('kind')
        expect(metadata.listView.showRelativeDates).toBe(false)
        expect(visibleColumns(metadata.listView)).toStrictEqual(['name', 'kind'])
    })

    test('primary list view settings win over the alternate form', () => {
        const list = decode([
            dir('lsvp', plist({ textSize: 11 })),
            dir('lsvP', plist({ textSize: 15 })),
        ]).listView
        expect(list.textSize).toBe(11)
    })

    test('undecodable property lists are ignored', () => {
        const { lines, config } = captureLog()
        const metadata = decode([dir('lsvp', Buffer.from('garbage')), dir('lsvP', plist({ textSize: 15 }))], config)
        expect(metadata.listView.textSize).toBe(15)
        expect(lines.some(line => line.includes('Ignoring undecodable property list.'))).toBe(true)
    })

    // Files ==================================================================

    test('per-file records', () => {

        const metadata = decode([
            record('a.txt', 'Iloc', blob(iloc(-10, 20))),
            record('a.txt', 'cmmt', { type: 'ustr', value: 'Notes' }),
            record('a.txt', 'lclr', { type: 'long', value: 6 }),
            record('b.txt', 'Iloc', blob(Buffer.alloc(6))),
            record('c.txt', 'lclr', { type: 'long', value: 9 }),
            record('d.txt', 'cmmt', { type: 'ustr', value: '' }),
            record('e.txt', 'dscl', { type: 'bool', value: true }),
            record('.', 'vstl', { type: 'type', value: 'icnv' }),
        ])

        expect([...metadata.icons.keys()]).toStrictEqual(['a.txt', 'd.txt'])
        expect(metadata.icons.get('a.txt')).toStrictEqual({ filename: 'a.txt', position: { x: -10, y: 20 }, comments: 'Notes', labelColor: 6 })
        expect(metadata.icons.get('d.txt')).toStrictEqual({ filename: 'd.txt', comments: '' })

    })

    test('file sizes and modification dates', () => {

        const modified = new Date(Date.UTC(2024, 0, 1))
        const metadata = decode([
            record('a.txt', 'lg1S', { type: 'comp', value: 5_000_000_000n }),
            record('a.txt', 'logS', { type: 'long', value: 1 }),
            record('a.txt', 'ph1S', { type: 'comp', value: 8192n }),
            record('a.txt', 'modD', { type: 'dutc', value: EntryCodec.dateToDutc(modified) }),
            record('b.txt', 'logS', { type: 'long', value: 12 }),
            record('b.txt', 'phyS', { type: 'long', value: 4096 }),
            record('b.txt', 'moDD', { type: 'dutc', value: EntryCodec.dateToDutc(modified) }),
            record('c.txt', 'logS', { type: 'long', value: -1 }),
        ])

        expect([...metadata.icons.keys()]).toStrictEqual(['a.txt', 'b.txt'])
        expect(metadata.icons.get('a.txt')).toStrictEqual({ filename: 'a.txt', logicalSize: 5_000_000_000, physicalSize: 8192, modificationDate: modified })
        expect(metadata.icons.get('b.txt')).toStrictEqual({ filename: 'b.txt', logicalSize: 12, physicalSize: 4096, modificationDate: modified })

    })

    test('single file lookup', () => {
        const decoder = new SemanticDecoder(storeOf([record('x', 'lclr', { type: 'long', value: 3 })]), { directory })
        expect(decoder.decodeIcon('x')).toStrictEqual({ filename: 'x', labelColor: 3 })
        expect(decoder.decodeIcon('y')).toBeUndefined()
    })

})
