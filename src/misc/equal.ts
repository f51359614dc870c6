/**
 * Structural equality for plain model values (objects, arrays, dates, primitives).
 * Object keys holding `undefined` count as absent.
 */
export default function isEqual(a: unknown, b: unknown): boolean {

    if (Object.is(a, b)) return true
    if (typeof a !== 'object' || typeof b !== 'object' || a === null || b === null) return false

    if (a instanceof Date || b instanceof Date)
        return a instanceof Date && b instanceof Date && Object.is(a.getTime(), b.getTime())

    if (Array.isArray(a) || Array.isArray(b)) {
        if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) return false
        return a.every((item, i) => isEqual(item, b[i]))
    }

    const keysOf = (value: object) => Object.entries(value).filter(([, item]) => item !== undefined)
    const left = keysOf(a)
    const right = new Map(keysOf(b))

    if (left.length !== right.size) return false
    return left.every(([key, item]) => right.has(key) && isEqual(item, right.get(key)))

}
