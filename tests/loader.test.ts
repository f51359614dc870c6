import fs from 'node:fs'
import path from 'node:path'
import { describe, test, expect, beforeEach, afterEach } from "vitest"
import MetadataLoader, { describeMetadata, labelColorIndex, labelColorName } from '../src/L2/MetadataLoader.js'
import { emptyMetadata } from '../src/L2/DirectoryMetadata.js'
import { captureLog, record, removeDirectory, useTempDirectory, writeRecords } from './defaults/records.js'

describe('Metadata loader', () => {

    let directory: string
    beforeEach(() => { directory = useTempDirectory('loader') })
    afterEach(() => removeDirectory(directory))

    test('a directory without a metadata file', () => {
        const metadata = new MetadataLoader().load(directory)
        expect(metadata).toStrictEqual(emptyMetadata(directory))
        expect(metadata.loaded).toBe(false)
    })

    test('a corrupt metadata file yields the defaults', () => {
        fs.writeFileSync(path.join(directory, '.DS_Store'), Buffer.alloc(64, 0x41))
        const { lines, config } = captureLog('warn')
        expect(new MetadataLoader(config).load(directory)).toStrictEqual(emptyMetadata(directory))
        expect(lines.filter(line => line.includes('Ignoring unusable metadata file.'))).toHaveLength(1)
    })

    test('reloading builds an equal but separate model', () => {
        writeRecords(directory, [
            record('.', 'vstl', { type: 'type', value: 'clmv' }),
            record('a.txt', 'cmmt', { type: 'ustr', value: 'first' }),
        ])
        const loader = new MetadataLoader()
        const first = loader.load(directory)
        const second = loader.reload(directory)
        expect(first.viewStyle).toBe('Column')
        expect(second).toStrictEqual(first)
        expect(second).not.toBe(first)
    })

    test('save and load again', () => {

        const loader = new MetadataLoader()
        const metadata = loader.load(directory)
        metadata.iconView.iconSize = 96
        metadata.icons.set('b.txt', { filename: 'b.txt', position: { x: 40, y: 60 }, labelColor: 5 })

        expect(loader.save(metadata)).toBeUndefined()

        const saved = loader.load(directory)
        expect(saved.loaded).toBe(true)
        expect(saved.iconView.iconSize).toBe(96)
        expect(saved.icons.get('b.txt')).toStrictEqual({ filename: 'b.txt', position: { x: 40, y: 60 }, labelColor: 5 })

    })

})

describe('Metadata summary', () => {

    test('label color names', () => {
        expect(labelColorName(2)).toBe('orange')
        expect(labelColorName(9)).toBe('9')
        expect(labelColorIndex('Gray')).toBe(7)
        expect(labelColorIndex('grey')).toBe(7)
        expect(labelColorIndex('none')).toBe(0)
        expect(labelColorIndex('pink')).toBeUndefined()
    })

    test('fields and per-file table', () => {

        const metadata = emptyMetadata('/Volumes/Placeholder')
        metadata.loaded = true
        metadata.viewStyle = 'Icon'
        metadata.windowFrame = { x: 20, y: 10, width: 400, height: 200 }
        metadata.chrome = { showSidebar: true, showToolbar: false }
        metadata.iconView = { iconSize: 64, arrangement: 'Grid', gridSpacing: 54.5 }
        metadata.background = { type: 'Color', color: { red: 1, green: 0.5, blue: 0 } }
        metadata.listView.sortColumn = 'name'
        metadata.listView.sortAscending = true
        metadata.icons.set('a.txt', { filename: 'a.txt', position: { x: 100, y: 50 }, labelColor: 2 })
        metadata.icons.set('b.txt', { filename: 'b.txt', comments: 'hi' })

        expect(describeMetadata(metadata).split('\n')).toStrictEqual([
            'Directory:   /Volumes/Placeholder',
            'Loaded:      yes',
            'View style:  Icon',
            'Window:      x=20 y=10 width=400 height=200',
            'Chrome:      showSidebar=yes showToolbar=no',
            'Icon view:   size=64 arrangement=Grid spacing=54.50',
            'Background:  Color (1.00, 0.50, 0.00)',
            'Sort:        name ascending',
            '',
            'file   x    y   label   comment',
            'a.txt  100  50  orange',
            'b.txt' + ' '.repeat(19) + 'hi',
        ])

    })

    test('nothing recorded', () => {
        expect(describeMetadata(emptyMetadata('/tmp/none'))).toBe([
            'Directory:   /tmp/none',
            'Loaded:      no',
            'Background:  Default',
        ].join('\n'))
    })

})
