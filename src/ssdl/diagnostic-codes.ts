export const SSDL_DIAGNOSTIC_CODES = Object.freeze({
  SSDL_SOURCE_FILE_UNREADABLE: 'SSDL_SOURCE_FILE_UNREADABLE',
  SSDL_SOURCE_FORMAT_UNSUPPORTED: 'SSDL_SOURCE_FORMAT_UNSUPPORTED',
  SSDL_SOURCE_MAX_INPUT_BYTES_EXCEEDED: 'SSDL_SOURCE_MAX_INPUT_BYTES_EXCEEDED',
  SSDL_SOURCE_YAML_SYNTAX: 'SSDL_SOURCE_YAML_SYNTAX',
  SSDL_SOURCE_ROOT_NOT_MAPPING: 'SSDL_SOURCE_ROOT_NOT_MAPPING',
  SSDL_SOURCE_KEY_NOT_SCALAR: 'SSDL_SOURCE_KEY_NOT_SCALAR',
  SSDL_SOURCE_ALIAS_UNRESOLVED: 'SSDL_SOURCE_ALIAS_UNRESOLVED',
  SSDL_SOURCE_MAX_DEPTH_EXCEEDED: 'SSDL_SOURCE_MAX_DEPTH_EXCEEDED',
  SSDL_SOURCE_MAX_ALIAS_COUNT_EXCEEDED: 'SSDL_SOURCE_MAX_ALIAS_COUNT_EXCEEDED',

  SSDL_PARSE_REQUIRED_KEY_MISSING: 'SSDL_PARSE_REQUIRED_KEY_MISSING',
  SSDL_PARSE_TYPE_MISMATCH: 'SSDL_PARSE_TYPE_MISMATCH',
  SSDL_PARSE_EMPTY_CONTAINER: 'SSDL_PARSE_EMPTY_CONTAINER',
  SSDL_PARSE_DUPLICATE_ENTRY: 'SSDL_PARSE_DUPLICATE_ENTRY',
  SSDL_PARSE_VERSION_INVALID: 'SSDL_PARSE_VERSION_INVALID',
  SSDL_PARSE_PORT_OUT_OF_RANGE: 'SSDL_PARSE_PORT_OUT_OF_RANGE',
  SSDL_PARSE_URI_INVALID: 'SSDL_PARSE_URI_INVALID',
  SSDL_PARSE_ENUM_VALUE_INVALID: 'SSDL_PARSE_ENUM_VALUE_INVALID',
  SSDL_PARSE_UNKNOWN_KEY: 'SSDL_PARSE_UNKNOWN_KEY',
  SSDL_PARSE_EXTRA_KEY_SHADOWED: 'SSDL_PARSE_EXTRA_KEY_SHADOWED',

  SSDL_VERSION_MAJOR_UNSUPPORTED: 'SSDL_VERSION_MAJOR_UNSUPPORTED',
  SSDL_VERSION_AHEAD: 'SSDL_VERSION_AHEAD',
  SSDL_VERSION_BEHIND: 'SSDL_VERSION_BEHIND',

  SSDL_EXTRACT_DUPLICATE_NAME: 'SSDL_EXTRACT_DUPLICATE_NAME',
  SSDL_EXTRACT_DUPLICATE_ROLE: 'SSDL_EXTRACT_DUPLICATE_ROLE',
  SSDL_EXTRACT_KEY_NAME_MISMATCH: 'SSDL_EXTRACT_KEY_NAME_MISMATCH',

  SSDL_XREF_SOURCE_MISSING: 'SSDL_XREF_SOURCE_MISSING',
  SSDL_XREF_ROLE_UNDECLARED: 'SSDL_XREF_ROLE_UNDECLARED',
  SSDL_XREF_VISUALIZATION_TYPE_UNSUPPORTED: 'SSDL_XREF_VISUALIZATION_TYPE_UNSUPPORTED',
  SSDL_RENDER_GEOMETRY_FIELD_MISSING: 'SSDL_RENDER_GEOMETRY_FIELD_MISSING',
  SSDL_RENDER_TIME_FIELD_MISSING: 'SSDL_RENDER_TIME_FIELD_MISSING',

  SSDL_QUERY_PROVIDER_UNSUPPORTED: 'SSDL_QUERY_PROVIDER_UNSUPPORTED',
  SSDL_QUERY_ENTITY_TYPE_UNKNOWN: 'SSDL_QUERY_ENTITY_TYPE_UNKNOWN',
  SSDL_QUERY_ATTRIBUTE_UNKNOWN: 'SSDL_QUERY_ATTRIBUTE_UNKNOWN',
} as const);

export type SsdlDiagnosticCode = (typeof SSDL_DIAGNOSTIC_CODES)[keyof typeof SSDL_DIAGNOSTIC_CODES];
