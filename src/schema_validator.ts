/**
 * Schema Validator - structural JSON checks for canonical protocol documents
 *
 * A small subset of JSON Schema: type, properties, required,
 * additionalProperties, items, enum, pattern, minimum, exclusiveMinimum,
 * maximum, and oneOf keyed by a discriminator property. Every issue is
 * collected rather than stopping at the first.
 */

export interface SchemaIssue {
    path: string;
    message: string;
}

export interface SchemaResult {
    valid: boolean;
    errors: SchemaIssue[];
}

export type JsonType = 'object' | 'array' | 'string' | 'number' | 'integer' | 'boolean' | 'null';

export interface JsonSchema {
    type?: JsonType | JsonType[];
    properties?: Record<string, JsonSchema>;
    required?: string[];
    additionalProperties?: boolean;
    items?: JsonSchema;
    enum?: readonly (string | number | boolean | null)[];
    pattern?: string;
    minimum?: number;
    exclusiveMinimum?: number;
    maximum?: number;
    minItems?: number;
    /** Variants chosen by the value of `discriminator`. */
    oneOf?: { discriminator: string; variants: Record<string, JsonSchema> };
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class SchemaValidator {
    private schemas: Map<string, JsonSchema> = new Map();

    registerSchema(schemaId: string, schema: JsonSchema): void {
        this.schemas.set(schemaId, schema);
    }

    hasSchema(schemaId: string): boolean {
        return this.schemas.has(schemaId);
    }

    validate(document: unknown, schemaId: string): SchemaResult {
        const schema = this.schemas.get(schemaId);
        if (!schema) {
            return {
                valid: false,
                errors: [{ path: '', message: `Schema not found: ${schemaId}` }],
            };
        }

        const errors: SchemaIssue[] = [];
        this.validateValue(document, schema, '', errors);

        return {
            valid: errors.length === 0,
            errors,
        };
    }

    private validateValue(
        value: unknown,
        schema: JsonSchema,
        path: string,
        errors: SchemaIssue[]
    ): void {
        // Type validation
        if (schema.type) {
            const allowed = Array.isArray(schema.type) ? schema.type : [schema.type];
            if (!allowed.some(t => this.matchesType(value, t))) {
                errors.push({
                    path,
                    message: `Expected type ${allowed.join(' | ')}, got ${this.getType(value)}`,
                });
                return;
            }
        }

        // Object validation
        if (isRecord(value)) {
            if (schema.required) {
                for (const req of schema.required) {
                    if (!(req in value)) {
                        errors.push({ path: `${path}.${req}`, message: 'Required field missing' });
                    }
                }
            }

            if (schema.properties) {
                for (const [key, propSchema] of Object.entries(schema.properties)) {
                    if (key in value) {
                        this.validateValue(value[key], propSchema, `${path}.${key}`, errors);
                    }
                }
                if (schema.additionalProperties === false) {
                    for (const key of Object.keys(value)) {
                        if (!(key in schema.properties)) {
                            errors.push({ path: `${path}.${key}`, message: 'Unknown field' });
                        }
                    }
                }
            }

            if (schema.oneOf) {
                const { discriminator, variants } = schema.oneOf;
                const tag = value[discriminator];
                const variant = typeof tag === 'string' ? variants[tag] : undefined;
                if (variant) {
                    this.validateValue(value, variant, path, errors);
                } else {
                    errors.push({
                        path: `${path}.${discriminator}`,
                        message: `Value must be one of: ${Object.keys(variants).join(', ')}`,
                    });
                }
            }
        }

        // Array validation
        if (Array.isArray(value)) {
            if (schema.minItems !== undefined && value.length < schema.minItems) {
                errors.push({ path, message: `Expected at least ${schema.minItems} item(s), got ${value.length}` });
            }
            if (schema.items) {
                for (let i = 0; i < value.length; i++) {
                    this.validateValue(value[i], schema.items, `${path}[${i}]`, errors);
                }
            }
        }

        // Enum validation
        if (schema.enum && !schema.enum.some(e => e === value)) {
            errors.push({
                path,
                message: `Value must be one of: ${schema.enum.join(', ')}`,
            });
        }

        // Pattern validation
        if (schema.pattern && typeof value === 'string') {
            const regex = new RegExp(schema.pattern);
            if (!regex.test(value)) {
                errors.push({ path, message: `Value does not match pattern: ${schema.pattern}` });
            }
        }

        // Number range validation
        if (typeof value === 'number') {
            if (schema.minimum !== undefined && value < schema.minimum) {
                errors.push({ path, message: `Value ${value} < minimum ${schema.minimum}` });
            }
            if (schema.exclusiveMinimum !== undefined && value <= schema.exclusiveMinimum) {
                errors.push({ path, message: `Value ${value} <= exclusive minimum ${schema.exclusiveMinimum}` });
            }
            if (schema.maximum !== undefined && value > schema.maximum) {
                errors.push({ path, message: `Value ${value} > maximum ${schema.maximum}` });
            }
        }
    }

    private matchesType(value: unknown, type: JsonType): boolean {
        if (type === 'integer') return typeof value === 'number' && Number.isInteger(value);
        if (type === 'number') return typeof value === 'number' && Number.isFinite(value);
        return this.getType(value) === type;
    }

    private getType(value: unknown): string {
        if (value === null) return 'null';
        if (Array.isArray(value)) return 'array';
        return typeof value;
    }
}
