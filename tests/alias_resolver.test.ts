import fs from 'node:fs'
import path from 'node:path'
import { describe, test, expect, beforeAll, afterAll } from "vitest"
import resolveAlias from '../src/L2/AliasResolver.js'
import { removeDirectory, useTempDirectory } from './defaults/records.js'

const options = { folders: ['.background', '.bg'], extensions: ['png', 'jpg'] }

const aliasWith = (text: string) => Buffer.concat([Buffer.alloc(24, 0x01), Buffer.from(text, 'utf-8'), Buffer.alloc(200)])

describe('Background alias resolution', () => {

    let directory: string
    beforeAll(() => {
        directory = useTempDirectory('alias')
        fs.mkdirSync(path.join(directory, '.background'))
        fs.writeFileSync(path.join(directory, '.background', 'b.png'), 'b')
        fs.writeFileSync(path.join(directory, '.background', 'a.jpg'), 'a')
        fs.writeFileSync(path.join(directory, '.background', 'notes.txt'), 'x')
        fs.writeFileSync(path.join(directory, 'embedded.png'), 'e')
    })
    afterAll(() => removeDirectory(directory))

    test('absolute path embedded in the record', () => {
        const image = path.join(directory, 'embedded.png')
        expect(resolveAlias(aliasWith(image), directory, options)).toBe(image)
    })

    test('embedded path relative to the directory', () => {
        expect(resolveAlias(aliasWith('/embedded.png'), directory, options)).toBe(path.join(directory, 'embedded.png'))
    })

    test('first image of a background folder', () => {
        expect(resolveAlias(aliasWith('/Volumes/Installer/.background/missing.png'), directory, options)).toBe(path.join(directory, '.background', 'a.jpg'))
        expect(resolveAlias(Buffer.alloc(200), directory, options)).toBe(path.join(directory, '.background', 'a.jpg'))
    })

    test('short records resolve to nothing', () => {
        expect(resolveAlias(Buffer.from('/embedded.png'), directory, options)).toBeUndefined()
    })

    test('nothing to find', () => {
        const empty = useTempDirectory('alias-empty')
        expect(resolveAlias(Buffer.alloc(200), empty, options)).toBeUndefined()
        expect(resolveAlias(Buffer.alloc(200), path.join(empty, 'missing'), options)).toBeUndefined()
        removeDirectory(empty)
    })

})
