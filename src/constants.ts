export const TOOL_VERSION = '1.2.0'

// Bumped whenever the container layout changes; newer archives are refused.
export const PSF_FORMAT_REVISION = 1

export const IDENTITY_FIELDS = ['semester', 'course', 'section', 'group', 'assignment'] as const

export const SUBMISSION_CONFIG_FILE = 'psf.toml'
export const ARCHIVE_EXTENSION = '.psf'
export const QUERY_TABLE_NAME = 'psf'

// Query columns computed from the archive rather than read from metadata
export const DERIVED_COLUMNS = ['path', 'filename', 'id', 'revisions', 'graded', 'score'] as const
export const FORENSIC_COLUMN_PREFIX = 'forensic_'
