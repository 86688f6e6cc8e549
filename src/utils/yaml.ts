/**
 * YAML parsing utilities with Zod validation.
 */
import { parse } from 'yaml';
import { z } from 'zod';
import { SystemError, ErrorCodes } from './errors.js';
import { readFile, readFileSync } from './file-system.js';

/**
 * Parse YAML content into an untyped value.
 */
export function parseYaml(content: string): unknown {
  try {
    return parse(content);
  } catch (error) {
    throw new SystemError(
      ErrorCodes.YAML_PARSE_ERROR,
      `Failed to parse YAML: ${error instanceof Error ? error.message : 'Unknown error'}`,
      { error }
    );
  }
}

/**
 * Result of validating parsed YAML against a schema.
 */
export type SchemaParseResult<T> =
  | { success: true; data: T }
  | { success: false; message: string; issues: z.ZodError['issues'] };

/**
 * Parse and validate YAML content with a Zod schema.
 * Syntax errors throw; schema mismatches are returned so callers can
 * raise the error type that fits them.
 */
export function parseYamlWithSchema<T extends z.ZodType>(
  content: string,
  schema: T
): SchemaParseResult<z.infer<T>> {
  const parsed = parseYaml(content);
  const result = schema.safeParse(parsed);

  if (!result.success) {
    return {
      success: false,
      message: formatZodError(result.error),
      issues: result.error.issues,
    };
  }

  return { success: true, data: result.data };
}

/**
 * Load a YAML file and validate it with a Zod schema.
 */
export async function loadYamlWithSchema<T extends z.ZodType>(
  filePath: string,
  schema: T
): Promise<SchemaParseResult<z.infer<T>>> {
  let content: string;
  try {
    content = await readFile(filePath);
  } catch (error) {
    throw new SystemError(
      ErrorCodes.FILE_READ_ERROR,
      `Failed to read YAML file: ${filePath}`,
      { filePath, error }
    );
  }
  return parseYamlWithSchema(content, schema);
}

/**
 * Synchronous variant of loadYamlWithSchema, for data bundled with the package.
 */
export function loadYamlWithSchemaSync<T extends z.ZodType>(
  filePath: string,
  schema: T
): SchemaParseResult<z.infer<T>> {
  let content: string;
  try {
    content = readFileSync(filePath);
  } catch (error) {
    throw new SystemError(
      ErrorCodes.FILE_READ_ERROR,
      `Failed to read YAML file: ${filePath}`,
      { filePath, error }
    );
  }
  return parseYamlWithSchema(content, schema);
}

/**
 * Format Zod errors into a readable string.
 */
export function formatZodError(error: z.ZodError): string {
  return error.issues
    .map((e) => {
      const path = e.path.join('.');
      return path ? `${path}: ${e.message}` : e.message;
    })
    .join('; ');
}
