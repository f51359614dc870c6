import type { TPoint, TRect } from './DirectoryMetadata.js'

// The metadata file measures windows from the top-left corner of the screen and
// places icons by their center, measured from the top-left of the view. The host
// UI measures frames and icon origins from the bottom-left.

/** Window content rectangle (top-left origin) to host window frame (bottom-left origin). */
export function contentRectToHostFrame(rect: TRect, screenHeight: number): TRect {
    return {
        x:      rect.x,
        y:      screenHeight - rect.y - rect.height,
        width:  rect.width,
        height: rect.height,
    }
}

/** Host window frame (bottom-left origin) to window content rectangle (top-left origin). */
export function hostFrameToContentRect(frame: TRect, screenHeight: number): TRect {
    return {
        x:      frame.x,
        y:      screenHeight - frame.y - frame.height,
        width:  frame.width,
        height: frame.height,
    }
}

/** Icon center (top-left origin) to the host's icon origin (bottom-left origin). */
export function iconCenterToHostOrigin(point: TPoint, viewHeight: number, iconHeight: number): TPoint {
    return {
        x: point.x,
        y: viewHeight - point.y - iconHeight,
    }
}

/** Host icon origin (bottom-left origin) back to the icon center (top-left origin). */
export function hostOriginToIconCenter(point: TPoint, viewHeight: number, iconHeight: number): TPoint {
    return {
        x: point.x,
        y: viewHeight - point.y - iconHeight,
    }
}

const NUMBER = /[-+]?(?:\d+\.?\d*|\.\d+)(?:[eE][-+]?\d+)?/g

/**
 * Parses rectangle notation such as `{{10, 20}, {400, 300}}`.
 * Returns `undefined` unless exactly four numbers are found.
 */
export function parseRectString(text: string): TRect | undefined {
    const numbers = (text.match(NUMBER) ?? []).map(Number)
    if (numbers.length !== 4 || numbers.some(n => !Number.isFinite(n))) return undefined
    const [x = 0, y = 0, width = 0, height = 0] = numbers
    return { x, y, width, height }
}

export function formatRectString(rect: TRect): string {
    return `{{${rect.x}, ${rect.y}}, {${rect.width}, ${rect.height}}}`
}
