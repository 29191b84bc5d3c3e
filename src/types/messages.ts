/**
 * Message keys for localized output
 *
 * Every key must exist in messages/messages.json with at least an ENGLISH entry.
 */

export type MessageKey =
  | 'prompt'
  | 'exit_message'
  | 'directory_created'
  | 'variable_created'
  | 'variable_set'
  | 'alias_created'
  | 'commands_loaded'
  | 'language_set'
  | 'run_cmd_executed'
  | 'command_failed'
  | 'run_nesh_executed'
  | 'result_saved'
  | 'sleep_executed'
  | 'config_refreshed'
  | 'error_parse'
  | 'error_unknown_command'
  | 'error_unknown_command_suggest'
  | 'error_unknown_subcommand'
  | 'error_undefined_variable'
  | 'error_duplicate_variable'
  | 'error_duplicate_alias'
  | 'error_type_mismatch'
  | 'error_invalid_option'
  | 'error_io'
  | 'error_command_definition'
  | 'error_no_result'
  | 'error_unsupported_language'
  | 'error_invalid_duration'
  | 'error_script'
  | 'error_recursion_limit'
  | 'error_reload';

/** Placeholder values for `{name}` slots in a message template */
export type MessageParams = Record<string, string | number>;
