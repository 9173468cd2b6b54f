/**
 * Schema Validator - minimal JSON schema validation for specforge.json
 */

export interface ValidationError {
    path: string;
    message: string;
}

export interface ValidationResult {
    valid: boolean;
    errors: ValidationError[];
}

export type JsonType = 'object' | 'array' | 'string' | 'number' | 'integer' | 'boolean' | 'null';

export interface JsonSchema {
    type: JsonType;
    properties?: Record<string, JsonSchema>;
    required?: string[];
    /** Reject keys not listed in `properties`. */
    additionalProperties?: boolean;
    items?: JsonSchema;
    enum?: ReadonlyArray<string | number | boolean>;
    pattern?: string;
    minimum?: number;
    maximum?: number;
    minLength?: number;
    minItems?: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class SchemaValidator {
    private schemas: Map<string, JsonSchema> = new Map();

    registerSchema(schemaId: string, schema: JsonSchema): void {
        this.schemas.set(schemaId, schema);
    }

    validate(artifact: unknown, schemaId: string): ValidationResult {
        const schema = this.schemas.get(schemaId);
        if (!schema) {
            return {
                valid: false,
                errors: [{ path: '', message: `Schema not found: ${schemaId}` }],
            };
        }

        const errors: ValidationError[] = [];
        this.validateValue(artifact, schema, '', errors);

        return {
            valid: errors.length === 0,
            errors,
        };
    }

    private validateValue(value: unknown, schema: JsonSchema, path: string, errors: ValidationError[]): void {
        const actualType = this.getType(value);
        const typeOk = schema.type === actualType || (schema.type === 'number' && actualType === 'integer');
        if (!typeOk) {
            errors.push({ path, message: `Expected type ${schema.type}, got ${actualType}` });
            return;
        }

        if (schema.type === 'object' && isRecord(value)) {
            for (const req of schema.required ?? []) {
                if (!(req in value)) {
                    errors.push({ path: `${path}.${req}`, message: 'Required field missing' });
                }
            }

            const props = schema.properties ?? {};
            for (const [key, child] of Object.entries(value)) {
                const propSchema = props[key];
                if (propSchema) {
                    this.validateValue(child, propSchema, `${path}.${key}`, errors);
                } else if (schema.additionalProperties === false) {
                    errors.push({ path: `${path}.${key}`, message: 'Unknown field' });
                }
            }
        }

        if (schema.type === 'array' && Array.isArray(value)) {
            if (schema.minItems !== undefined && value.length < schema.minItems) {
                errors.push({ path, message: `Expected at least ${schema.minItems} item(s)` });
            }
            if (schema.items) {
                for (let i = 0; i < value.length; i++) {
                    this.validateValue(value[i], schema.items, `${path}[${i}]`, errors);
                }
            }
        }

        if (schema.enum) {
            const allowed = schema.enum;
            if (!allowed.some((v) => v === value)) {
                errors.push({ path, message: `Value must be one of: ${allowed.join(', ')}` });
            }
        }

        if (typeof value === 'string') {
            if (schema.minLength !== undefined && value.length < schema.minLength) {
                errors.push({ path, message: `Expected at least ${schema.minLength} character(s)` });
            }
            if (schema.pattern && !new RegExp(schema.pattern).test(value)) {
                errors.push({ path, message: `Value does not match pattern: ${schema.pattern}` });
            }
        }

        if (typeof value === 'number') {
            if (schema.minimum !== undefined && value < schema.minimum) {
                errors.push({ path, message: `Value ${value} < minimum ${schema.minimum}` });
            }
            if (schema.maximum !== undefined && value > schema.maximum) {
                errors.push({ path, message: `Value ${value} > maximum ${schema.maximum}` });
            }
        }
    }

    private getType(value: unknown): JsonType | 'undefined' | 'function' | 'symbol' | 'bigint' {
        if (value === null) return 'null';
        if (Array.isArray(value)) return 'array';
        if (typeof value === 'number' && Number.isInteger(value)) return 'integer';
        return typeof value;
    }
}
