import Plist, { PlistReal, type TPlistDict, type TPlistValue } from '../L0/Plist.js'

// Loose readers for plist dictionary values, which different writers store
// with different types (integers vs. reals, booleans vs. 0/1).

export function asNumber(value: TPlistValue | undefined): number | undefined {
    if (typeof value === 'number') return value
    if (typeof value === 'bigint') return Number(value)
    if (value instanceof PlistReal) return value.value
    return undefined
}

export function asBoolean(value: TPlistValue | undefined): boolean | undefined {
    if (typeof value === 'boolean') return value
    const number = asNumber(value)
    return number === undefined ? undefined : number !== 0
}

export function asString(value: TPlistValue | undefined): string | undefined {
    return typeof value === 'string' ? value : undefined
}

export function asBuffer(value: TPlistValue | undefined): Buffer | undefined {
    return Buffer.isBuffer(value) ? value : undefined
}

export function asDict(value: TPlistValue | undefined): TPlistDict | undefined {
    return value !== undefined && Plist.isDict(value) ? value : undefined
}
