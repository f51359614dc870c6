import type * as T from '../../types.js'

export default class DSMetaError<Code extends DSMetaErrorCode = DSMetaErrorCode> extends Error {

    public readonly code: Code
    public readonly causes: Error[]
    public readonly meta: DSMetaErrorMetadata = {}
    public readonly rootCause?: Error

    constructor(code: Code, message?: string | null, cause?: Error | null, meta?: DSMetaErrorMetadata) {

        super(message || errorCodes[code])
        this.name = this.constructor.name
        this.code = code
        meta && (this.meta = meta)

        Error.captureStackTrace(this, this.constructor)

        if (cause instanceof DSMetaError) this.causes = [cause, ...cause.causes]
        else if (cause) this.causes = [cause]
        else this.causes = []

        if (this.causes.length > 0) this.rootCause = this.causes[this.causes.length-1]

    }

    /**
     * Constructs a new DSMetaError instance in an Eav (error-as-value) format.
     * @returns [DSMetaError, null]
     */
    public static eav<Code extends DSMetaErrorCode>(code: Code, ...params: T.OmitFirst<ConstructorParameters<typeof DSMetaError>>): [DSMetaError<Code>, null] {
        return [new this(code, ...params), null]
    }

}

export type DSMetaErrorCode = keyof typeof errorCodes
export type DSMetaErrorMetadata = { [key: string]: unknown }

const errorCodes = {

    // Scheme: LEVEL_SCOPE_ERRORCODE_...

    // Level 0 =========================================================================================================

    // Entry codec
    L0_EC_MALFORMED:                'A record value declares a length that exceeds the remaining bytes.',
    L0_EC_UNKNOWN_TYPE:             'A record carries a value type tag that is not recognized.',
    L0_EC_ENCODE:                   'Failed to encode a record value.',
    L0_EC_RANGE:                    'A record value is out of range for its type.',

    // Binary property lists
    L0_PL_PARSE:                    'Failed to parse a binary property list.',
    L0_PL_FORMAT:                   'The data is not a binary property list (missing "bplist00" header).',
    L0_PL_SERIALIZE:                'Failed to serialize a binary property list.',

    // Level 1 =========================================================================================================

    // Buddy allocator
    L1_BA_HEADER:                   'The allocator header is invalid (bad magic or root block bounds).',
    L1_BA_ROOT:                     'Failed to deserialize the allocator root block.',
    L1_BA_BLOCK_RANGE:              'A block number points outside of the block address table.',
    L1_BA_SERIALIZE:                'Failed to serialize the allocator root block.',

    // Store
    L1_ST_NOT_FOUND:                'The metadata file does not exist.',
    L1_ST_READ:                     'The metadata file exists but could not be read.',
    L1_ST_CORRUPT:                  'The metadata file is structurally invalid.',
    L1_ST_NODE_CYCLE:               'The B-tree references the same node more than once.',
    L1_ST_RECORD_TOO_LARGE:         'A record is too large to fit within a single B-tree page.',
    L1_ST_SERIALIZE:                'Failed to serialize the record set.',
    L1_ST_WRITE:                    'Failed to write the metadata file.',

    // Level 2 =========================================================================================================

    L2_AL_UNRESOLVED:               'The background image alias could not be resolved to an existing file.',
    L2_SV_READ:                     'Failed to read the current metadata before saving.',
    L2_SV_ENCODE:                   'Failed to encode the directory metadata into records.',
    L2_SV_WRITE:                    'Failed to save the directory metadata.',

    // Configuration ===================================================================================================

    CF_LOAD:                        'Failed to read the configuration file.',
    CF_INVALID:                     'The configuration does not match the expected schema.',

} as const
