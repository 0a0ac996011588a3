/**
 * Query dialect of a log source: which fields exist in each record version,
 * how records are parsed, and which fields are numeric or computed.
 *
 * Implementations are immutable and shared read-only by the parser and builder.
 */
export interface Schema {
  /**
   * Return the `parse` statement for a record version.
   * @throws SchemaError when the version is not supported
   */
  getParsePattern(version: number): string;

  /**
   * Check that a field exists in the given version.
   * `*` and computed fields are always accepted for a supported version.
   * @throws SchemaError for an unknown version or field
   */
  validateField(field: string, version: number): void;

  /** @throws SchemaError when the version is not supported */
  validateVersion(version: number): void;

  getDefaultVersion(): number;

  isNumeric(field: string): boolean;

  /**
   * Query-language expression for a computed field, or an empty string when
   * the field is stored and should be used literally.
   */
  getComputedFieldExpression(field: string, version: number): string;

  /** Record fields of a version, in record order. */
  getFields(version: number): readonly string[];

  /** Names of fields derived from other fields rather than stored. */
  getComputedFields(): readonly string[];
}
