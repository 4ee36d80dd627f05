/**
 * Configuration types for headergen.toml parsing.
 *
 * Field names follow the TOML keys.
 *
 * @packageDocumentation
 */

/**
 * Output language. Only C is emitted; C++ consumers get `extern "C"` through `cpp_compat`.
 */
export type Language = 'C';

/**
 * How documentation comments are written.
 *
 * `c` writes `/* … *\/` blocks, `c99` writes `//` lines, `doxy` writes
 * `/** … *\/` blocks and `auto` picks `doxy`.
 */
export type DocumentationStyle = 'c' | 'c99' | 'doxy' | 'auto';

/**
 * How structs, unions and enums are declared.
 *
 * `both` writes `typedef struct X {…} X;`, `type` writes `typedef struct {…} X;`
 * and `tag` writes `struct X {…};`, referencing it as `struct X`.
 */
export type DeclarationStyle = 'both' | 'type' | 'tag';

/**
 * Layout of function parameter lists.
 */
export type ArgLayout = 'horizontal' | 'vertical' | 'auto';

/**
 * Environment used to evaluate conditional-compilation predicates.
 */
export interface CfgConfig {
  /** Bare flags such as `unix`. */
  flags: Record<string, boolean>;
  /** Features, matched by `feature = "name"` leaves. */
  features: Record<string, boolean>;
  /** Key/value settings such as `target_os = "linux"`. */
  values: Record<string, string>;
}

/**
 * Export filtering and naming.
 */
export interface ExportConfig {
  /** Extra root names for specialization. */
  include: string[];
  /** Names removed from the output. */
  exclude: string[];
  /** Names emitted only as forward-declared opaque types. */
  opaque: string[];
  /** Prefix prepended to type and constant export names. */
  prefix: string;
  /** Canonical name to export name. */
  rename: Record<string, string>;
  /** Type names supplied by included headers. */
  external_types: string[];
}

/**
 * Function declarations.
 */
export interface FnConfig {
  rename_args: string;
  args: ArgLayout;
  /** Attribute written after functions that never return. */
  no_return: string;
  /** Attribute written before deprecated functions. */
  deprecated: string;
  /** Attribute written before `must_use` functions. */
  must_use: string;
}

export interface StructConfig {
  rename_fields: string;
}

export interface EnumConfig {
  rename_variants: string;
  /** Prefix every variant with the enum's export name. */
  prefix_with_name: boolean;
}

/**
 * Pointer annotations written after the `*` of nullable and non-null pointers.
 */
export interface PtrConfig {
  non_null_attribute: string;
  nullable_attribute: string;
}

export interface SpecializationConfig {
  /** Deepest allowed chain of generic instantiations. */
  max_depth: number;
}

/**
 * Complete configuration structure for headergen.toml.
 */
export interface Config {
  language: Language;
  /** Text written at the very top of the header. */
  header: string;
  /** Text written at the very end of the header. */
  trailer: string;
  /** Include guard macro; empty for none. */
  include_guard: string;
  pragma_once: boolean;
  autogen_warning: string;
  /** Write the generator version in a comment. */
  include_version: boolean;
  /** Skip every `#include`, default and configured. */
  no_includes: boolean;
  /** Extra `#include <…>` lines; the defaults are kept. */
  sys_includes: string[];
  /** Extra `#include "…"` lines. */
  includes: string[];
  cpp_compat: boolean;
  documentation: boolean;
  documentation_style: DocumentationStyle;
  line_length: number;
  tab_width: number;
  style: DeclarationStyle;
  cfg: CfgConfig;
  export: ExportConfig;
  fn: FnConfig;
  struct: StructConfig;
  enum: EnumConfig;
  ptr: PtrConfig;
  specialization: SpecializationConfig;
}
