// Types ===============================================================================================================

export interface TPoint {
    x: number
    y: number
}

export interface TRect {
    x:      number
    y:      number
    width:  number
    height: number
}

export type TViewStyle = 'Icon' | 'List' | 'Column' | 'Gallery' | 'Coverflow'
export type TIconArrangement = 'None' | 'Grid'
export type TLabelPosition = 'Bottom' | 'Right'
export type TBackgroundType = 'Default' | 'Color' | 'Picture'

/** Color with channels in the 0-1 range. */
export interface TColor {
    red:    number
    green:  number
    blue:   number
}

export interface TBackground {
    /** How the window background is drawn               */ type:               TBackgroundType
    /** Background color (set when one is recorded)      */ color?:             TColor
    /** Absolute path of the resolved background image   */ imagePath?:         string
}

export interface TIconViewSettings {
    /** Icon size in points (1-512)                      */ iconSize?:          number
    /** Automatic arrangement                            */ arrangement?:       TIconArrangement
    /** Label placement relative to the icon             */ labelPosition?:     TLabelPosition
    /** Grid spacing in points                           */ gridSpacing?:       number
    /** Label text size in points                        */ textSize?:          number
    /** Show item info below the label                   */ showItemInfo?:      boolean
    /** Show content previews as icons                   */ showIconPreview?:   boolean
}

export interface TListViewSettings {
    /** Text size in points                              */ textSize?:          number
    /** Icon size in points                              */ iconSize?:          number
    /** Identifier of the sort column                    */ sortColumn?:        string
    /** Sort direction of the sort column                */ sortAscending?:     boolean
    /** Column identifier to width in points             */ columnWidths:       Record<string, number>
    /** Column identifier to visibility                  */ columnVisible:      Record<string, boolean>
    /** Show dates as "Today", "Yesterday" and so on     */ showRelativeDates?: boolean
}

export interface TWindowChrome {
    showSidebar?:   boolean
    showToolbar?:   boolean
    showStatusBar?: boolean
    showPathBar?:   boolean
}

/** Per-file view state. Only created when at least one field is recorded. */
export interface TIconInfo {
    /** File name within the directory                   */ filename:           string
    /** Icon center, top-left origin                     */ position?:          TPoint
    /** Finder comment                                   */ comments?:          string
    /** Label color index (0: none, 1-7: colors)         */ labelColor?:        number
    /** Logical size in bytes, as last cached            */ logicalSize?:       number
    /** Physical (allocated) size in bytes               */ physicalSize?:      number
    /** Modification date, as last cached                */ modificationDate?:  Date
}

/**
 * View state of a single directory.
 * Optional fields are absent (`undefined`) when the metadata file records nothing for them.
 */
export interface TDirectoryMetadata {
    /** Directory the metadata describes                 */ directory:          string
    /** Whether a metadata file was found and parsed     */ loaded:             boolean
    /** Window content rectangle, top-left origin        */ windowFrame?:       TRect
    /** Initial view style                               */ viewStyle?:         TViewStyle
    /** Key icons are sorted or grouped by ("name", ...) */ sortBy?:            string
    /** Icon view settings                               */ iconView:           TIconViewSettings
    /** Window background                                */ background:         TBackground
    /** Sidebar width in points                          */ sidebarWidth?:      number
    /** Window toolbar, sidebar and bar visibility       */ chrome:             TWindowChrome
    /** List view settings                               */ listView:           TListViewSettings
    /** Per-file view state, keyed by filename           */ icons:              Map<string, TIconInfo>
}

// Exports =============================================================================================================

/** Creates the metadata of a directory with nothing recorded. */
export function emptyMetadata(directory: string): TDirectoryMetadata {
    return {
        directory,
        loaded: false,
        iconView: {},
        background: { type: 'Default' },
        chrome: {},
        listView: { columnWidths: {}, columnVisible: {} },
        icons: new Map(),
    }
}

/** Deep copy, so that a caller can edit a model without touching the loaded one. */
export function cloneMetadata(metadata: TDirectoryMetadata): TDirectoryMetadata {
    return structuredClone(metadata)
}

/** Identifiers of the list view columns recorded as visible, in recorded order. */
export function visibleColumns(view: TListViewSettings): string[] {
    return Object.entries(view.columnVisible).flatMap(([identifier, visible]) => visible ? [identifier] : [])
}
