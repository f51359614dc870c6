import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import Config from '../../src/Config.js'
import type { TLogLevel, TLogSink } from '../../src/misc/log.js'
import Plist, { type TPlistDict } from '../../src/L0/Plist.js'
import type { TRecord, TRecordValue } from '../../src/L0/EntryCodec.js'
import BTreeStore from '../../src/L1/BTreeStore.js'

/** Creates a fresh directory under the OS temp dir. */
export function useTempDirectory(name: string) {
    return fs.mkdtempSync(path.join(os.tmpdir(), `dsmeta-${name}-`))
}

export function removeDirectory(directory: string) {
    fs.rmSync(directory, { recursive: true, force: true })
}

export const record = (filename: string, code: string, value: TRecordValue): TRecord => ({ filename, code, value })
export const blob = (data: Buffer): TRecordValue => ({ type: 'blob', value: data })

/** Serialized property list, for building `bwsp`/`icvp`/`lsvp` records. */
export function plist(dict: TPlistDict): Buffer {
    const [error, data] = Plist.serialize(dict)
    if (error) throw error
    return data
}

/** 16-byte icon location record. */
export function iloc(x: number, y: number): Buffer {
    const data = Buffer.alloc(16, 0xFF)
    data.writeInt32BE(x, 0)
    data.writeInt32BE(y, 4)
    data.writeUInt16BE(0, 14)
    return data
}

/** In-memory store holding `records`. */
export function storeOf(records: TRecord[], config?: Config): BTreeStore {
    const store = BTreeStore.create(path.join(os.tmpdir(), 'dsmeta-unused', '.DS_Store'), config)
    for (const item of records) store.setEntry(item)
    return store
}

/** Writes `records` as the complete metadata file of `directory`. */
export function writeRecords(directory: string, records: TRecord[], config?: Config): string {
    const file = path.join(directory, '.DS_Store')
    const error = BTreeStore.write(file, records, { replace: true }, config)
    if (error) throw error
    return file
}

/** Configuration whose log lines are collected instead of printed. */
export function captureLog(level: TLogLevel = 'debug') {
    const lines: string[] = []
    const sink: TLogSink = {
        debug: line => lines.push(line),
        info:  line => lines.push(line),
        warn:  line => lines.push(line),
        error: line => lines.push(line),
    }
    return { lines, config: Config.defaults().withLogging(level, sink) }
}
