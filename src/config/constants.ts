/**
 * Configuration constants
 */

export const TOOL_NAME = 'has-lib-target';
export const TOOL_VERSION = '0.1.0';
export const DIAGNOSTIC_PREFIX = `[${TOOL_NAME}]`;

export const LIB_TARGET_KIND = 'lib';
export const STDIN_MARKER = '-';

// Legacy invocation: the document text and the package name come from the environment
export const METADATA_ENV_VAR = 'HAS_LIB_TARGET_METADATA';
export const PACKAGE_ENV_VAR = 'HAS_LIB_TARGET_PACKAGE';
