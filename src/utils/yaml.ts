/**
 * YAML parsing utilities for settings and overlay manifests.
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
    const parsed: unknown = parse(content);
    return parsed;
  } catch (error) {
    throw new SystemError(
      ErrorCodes.PARSE_ERROR,
      `Failed to parse YAML: ${error instanceof Error ? error.message : 'Unknown error'}`,
      { error }
    );
  }
}

/**
 * Parse and validate YAML content with a Zod schema.
 */
export function parseYamlWithSchema<T extends z.ZodTypeAny>(
  content: string,
  schema: T
): z.infer<T> {
  const parsed = parseYaml(content);
  const result = schema.safeParse(parsed);

  if (!result.success) {
    throw new SystemError(
      ErrorCodes.PARSE_ERROR,
      `YAML validation failed: ${formatZodError(result.error)}`,
      { errors: result.error.issues }
    );
  }

  return result.data;
}

/**
 * Load and validate a YAML file with a Zod schema.
 */
export async function loadYamlWithSchema<T extends z.ZodTypeAny>(
  filePath: string,
  schema: T
): Promise<z.infer<T>> {
  let content: string;
  try {
    content = await readFile(filePath);
  } catch (error) {
    throw new SystemError(
      ErrorCodes.FILE_UNREADABLE,
      `Failed to read YAML file: ${filePath}`,
      { filePath, error }
    );
  }
  return withFileContext(filePath, () => parseYamlWithSchema(content, schema));
}

/**
 * Synchronous form of loadYamlWithSchema, used while scanning partitions.
 */
export function loadYamlWithSchemaSync<T extends z.ZodTypeAny>(
  filePath: string,
  schema: T
): z.infer<T> {
  let content: string;
  try {
    content = readFileSync(filePath);
  } catch (error) {
    throw new SystemError(
      ErrorCodes.FILE_UNREADABLE,
      `Failed to read YAML file: ${filePath}`,
      { filePath, error }
    );
  }
  return withFileContext(filePath, () => parseYamlWithSchema(content, schema));
}

function withFileContext<R>(filePath: string, run: () => R): R {
  try {
    return run();
  } catch (error) {
    if (error instanceof SystemError) {
      // Re-throw with file path context
      throw new SystemError(
        error.code,
        `${error.message} (file: ${filePath})`,
        { ...error.details, filePath }
      );
    }
    throw error;
  }
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
