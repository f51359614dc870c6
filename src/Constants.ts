export const KB_2   = 2048
export const KB_4   = 4096
export const KB_64  = 65536

/** Default name of the metadata sidecar file inside a directory. */
export const STORE_FILENAME = '.DS_Store'
/** Filename under which directory-level records are stored. */
export const DIRECTORY_FILENAME = '.'

/** B-tree page size written into new files. */
export const PAGE_SIZE = KB_4
/** Minimum size of the allocator's root block. */
export const ROOT_BLOCK_SIZE = KB_2

export const ICON_SIZE_MIN = 1
export const ICON_SIZE_MAX = 512
export const LABEL_COLOR_MAX = 7

/** Alias records shorter than this carry no usable path information. */
export const ALIAS_MIN_LENGTH = 150

export const BACKGROUND_FOLDERS = ['.background', '.bg'] as const
export const IMAGE_EXTENSIONS = ['png', 'jpg', 'jpeg', 'tiff', 'gif', 'bmp'] as const
