/**
 * Default configuration values for headergen.toml.
 *
 * @packageDocumentation
 */

import type {
  CfgConfig,
  Config,
  EnumConfig,
  ExportConfig,
  FnConfig,
  PtrConfig,
  SpecializationConfig,
  StructConfig,
} from './types.js';

/**
 * System headers included unless `no_includes` is set.
 */
export const DEFAULT_SYS_INCLUDES: readonly string[] = [
  'stdarg.h',
  'stdbool.h',
  'stddef.h',
  'stdint.h',
  'stdlib.h',
];

export const DEFAULT_CFG: CfgConfig = {
  flags: {},
  features: {},
  values: {},
};

export const DEFAULT_EXPORT: ExportConfig = {
  include: [],
  exclude: [],
  opaque: [],
  prefix: '',
  rename: {},
  external_types: [],
};

export const DEFAULT_FN: FnConfig = {
  rename_args: 'None',
  args: 'auto',
  no_return: '',
  deprecated: '',
  must_use: '',
};

export const DEFAULT_STRUCT: StructConfig = {
  rename_fields: 'None',
};

export const DEFAULT_ENUM: EnumConfig = {
  rename_variants: 'None',
  prefix_with_name: false,
};

export const DEFAULT_PTR: PtrConfig = {
  non_null_attribute: '',
  nullable_attribute: '',
};

export const DEFAULT_SPECIALIZATION: SpecializationConfig = {
  max_depth: 32,
};

/**
 * Complete default configuration.
 */
export const DEFAULT_CONFIG: Config = {
  language: 'C',
  header: '',
  trailer: '',
  include_guard: '',
  pragma_once: false,
  autogen_warning: '',
  include_version: false,
  no_includes: false,
  sys_includes: [],
  includes: [],
  cpp_compat: false,
  documentation: true,
  documentation_style: 'auto',
  line_length: 100,
  tab_width: 2,
  style: 'both',
  cfg: DEFAULT_CFG,
  export: DEFAULT_EXPORT,
  fn: DEFAULT_FN,
  struct: DEFAULT_STRUCT,
  enum: DEFAULT_ENUM,
  ptr: DEFAULT_PTR,
  specialization: DEFAULT_SPECIALIZATION,
};
