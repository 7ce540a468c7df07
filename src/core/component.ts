/**
 * Component System
 *
 * Components are sealed bags of typed fields. This module handles:
 * - Component type definitions with schemas
 * - Type inference from default values
 * - Pre-generated accessor classes (one per component type)
 * - Validated writes, by name or by typed patch
 *
 * The set of fields is fixed when the type is defined. Instances are sealed,
 * so no field can be added or removed at runtime; a write naming a field the
 * schema does not declare throws UnknownFieldError.
 */

import { UnknownFieldError } from '../errors';

/**
 * Supported field types.
 * - number: any non-NaN number
 * - bool: boolean
 * - string: string
 * - list: array (element shape is not checked)
 */
export type FieldType = 'number' | 'bool' | 'string' | 'list';

export interface FieldDefinition {
    type: FieldType;
    default: unknown;
    /** Applied to every value written to the field, after its type is checked. */
    normalize?: (value: unknown) => unknown;
}

export interface ComponentSchema {
    [fieldName: string]: FieldDefinition;
}

const FIELD_SPEC = Symbol('fieldSpec');

/**
 * Explicit field declaration, for fields that need a normalizer or whose
 * type cannot be inferred from the default alone.
 */
export interface FieldSpec<V> {
    readonly [FIELD_SPEC]: true;
    readonly type: FieldType;
    readonly default: V;
    readonly normalize?: (value: V) => V;
}

export function field<V>(type: FieldType, defaultValue: V, normalize?: (value: V) => V): FieldSpec<V> {
    return { [FIELD_SPEC]: true, type, default: defaultValue, normalize };
}

function isFieldSpec(value: unknown): value is FieldSpec<unknown> {
    return typeof value === 'object' && value !== null && FIELD_SPEC in value;
}

type Widen<V> = V extends boolean ? boolean : V extends number ? number : V extends string ? string : V;

type FieldValue<D> = D extends FieldSpec<infer V> ? V : Widen<D>;

/** Field record described by a defaults object passed to defineComponent. */
export type FieldsOf<D> = { [K in keyof D]: FieldValue<D[K]> };

const TYPE = Symbol('componentType');
const VALUES = Symbol('componentValues');

/**
 * Base of every generated accessor class. Field accessors live on the
 * generated prototype; values live in a per-instance record.
 */
abstract class ComponentBase {
    readonly [TYPE]: ComponentType<object>;
    readonly [VALUES]: Record<string, unknown>;

    constructor(type: ComponentType<object>, values: Record<string, unknown>) {
        this[TYPE] = type;
        this[VALUES] = values;
        Object.seal(this);
    }
}

/** A component instance: its fields, readable and writable by name. */
export type Component<T extends object> = ComponentBase & T;

export type AnyComponent = ComponentBase;

/**
 * Component type definition.
 */
export interface ComponentType<T extends object> {
    readonly name: string;
    readonly schema: ComponentSchema;
    readonly fieldNames: readonly string[];
    /** Create an instance, starting from defaults and applying `init`. */
    create(init?: Partial<T>): Component<T>;
}

/**
 * Infer field definition from a default value.
 */
export function inferFieldDef(value: unknown): FieldDefinition {
    if (isFieldSpec(value)) {
        return { type: value.type, default: value.default, normalize: value.normalize };
    }
    if (typeof value === 'boolean') {
        return { type: 'bool', default: value };
    }
    if (typeof value === 'number') {
        return { type: 'number', default: value };
    }
    if (typeof value === 'string') {
        return { type: 'string', default: value };
    }
    if (Array.isArray(value)) {
        return { type: 'list', default: value };
    }

    throw new Error(
        `Unsupported field default: ${typeof value}. ` +
        `Components can only contain numbers, booleans, strings and lists.`
    );
}

function matchesType(type: FieldType, value: unknown): boolean {
    switch (type) {
        case 'number':
            return typeof value === 'number' && !Number.isNaN(value);
        case 'bool':
            return typeof value === 'boolean';
        case 'string':
            return typeof value === 'string';
        case 'list':
            return Array.isArray(value);
    }
}

function coerceField(componentName: string, fieldName: string, def: FieldDefinition, value: unknown): unknown {
    if (!matchesType(def.type, value)) {
        throw new TypeError(
            `Field '${componentName}.${fieldName}' expects ${def.type}, got ${Array.isArray(value) ? 'array' : typeof value}`
        );
    }
    return def.normalize ? def.normalize(value) : value;
}

function cloneDefault(value: unknown): unknown {
    return Array.isArray(value) ? structuredClone(value) : value;
}

/**
 * Generate an accessor class for a component type.
 * Uses Object.defineProperty on the prototype (not Proxy), one class per type.
 */
function generateAccessorClass(
    name: string,
    schema: ComponentSchema
): new (type: ComponentType<object>, values: Record<string, unknown>) => ComponentBase {
    const AccessorClass = class extends ComponentBase {};
    Object.defineProperty(AccessorClass, 'name', { value: name });

    for (const [fieldName, fieldDef] of Object.entries(schema)) {
        Object.defineProperty(AccessorClass.prototype, fieldName, {
            get(this: ComponentBase) {
                return this[VALUES][fieldName];
            },
            set(this: ComponentBase, value: unknown) {
                this[VALUES][fieldName] = coerceField(name, fieldName, fieldDef, value);
            },
            enumerable: true,
            configurable: false
        });
    }

    return AccessorClass;
}

/**
 * Component registry - stores all defined components.
 */
const componentRegistry = new Map<string, ComponentType<object>>();

/**
 * Define a new component type.
 *
 * @param name Unique component name
 * @param defaults Default values (type inferred from values, or given with field())
 *
 * @example
 * const Health = defineComponent('Health', { current: 100, maximum: 100 });
 * const Rotation = defineComponent('Rotation', { angle: field('number', 0, wrapDegrees) });
 */
export function defineComponent<D extends Record<string, unknown>>(
    name: string,
    defaults: D
): ComponentType<FieldsOf<D>> {
    if (componentRegistry.has(name)) {
        throw new Error(`Component '${name}' is already defined`);
    }

    const schema: ComponentSchema = {};
    for (const [fieldName, defaultValue] of Object.entries(defaults)) {
        schema[fieldName] = inferFieldDef(defaultValue);
    }
    const fieldNames = Object.freeze(Object.keys(schema));
    const AccessorClass = generateAccessorClass(name, schema);

    const componentType: ComponentType<FieldsOf<D>> = {
        name,
        schema,
        fieldNames,
        create(init) {
            const values: Record<string, unknown> = {};
            for (const fieldName of fieldNames) {
                values[fieldName] = cloneDefault(schema[fieldName].default);
            }
            const instance = new AccessorClass(componentType, values);
            if (init) assignFields(instance, init);
            return asComponent(instance, componentType);
        }
    };

    componentRegistry.set(name, componentType);
    return componentType;
}

/**
 * Instances are built by the type's own accessor class, so an instance
 * created through `type.create` always carries the type's fields.
 */
function asComponent<T extends object>(instance: ComponentBase, _type: ComponentType<T>): Component<T> {
    return instance as Component<T>;
}

export function createComponent<T extends object>(type: ComponentType<T>, init?: Partial<T>): Component<T> {
    return type.create(init);
}

export function isComponent(value: unknown): value is AnyComponent {
    return value instanceof ComponentBase;
}

export function isComponentOf<T extends object>(value: unknown, type: ComponentType<T>): value is Component<T> {
    return value instanceof ComponentBase && value[TYPE] === type;
}

export function componentTypeOf(component: AnyComponent): ComponentType<object> {
    return component[TYPE];
}

/**
 * Write several fields at once. Every name is checked before anything is
 * written, so a rejected call leaves the component untouched.
 *
 * @throws UnknownFieldError if a name is not declared by the component's schema
 * @throws TypeError if a value does not match its field's type
 */
export function assignFields(component: AnyComponent, values: Readonly<Record<string, unknown>>): void {
    const type = component[TYPE];
    const coerced: Array<[string, unknown]> = [];

    for (const [fieldName, value] of Object.entries(values)) {
        const def = Object.hasOwn(type.schema, fieldName) ? type.schema[fieldName] : undefined;
        if (!def) {
            throw new UnknownFieldError(type.name, fieldName);
        }
        if (value === undefined) continue;
        coerced.push([fieldName, coerceField(type.name, fieldName, def, value)]);
    }

    for (const [fieldName, value] of coerced) {
        component[VALUES][fieldName] = value;
    }
}

/**
 * Typed counterpart of assignFields: naming an undeclared field is a
 * compile error.
 */
export function setFields<T extends object>(component: Component<T>, patch: Partial<T>): void {
    assignFields(component, patch);
}

/**
 * Read one field by name.
 *
 * @throws UnknownFieldError if the schema does not declare `fieldName`
 */
export function getField(component: AnyComponent, fieldName: string): unknown {
    const type = component[TYPE];
    if (!Object.hasOwn(type.schema, fieldName)) {
        throw new UnknownFieldError(type.name, fieldName);
    }
    return component[VALUES][fieldName];
}

/**
 * Plain copy of a component's current field values.
 */
export function readFields(component: AnyComponent): Record<string, unknown> {
    return { ...component[VALUES] };
}

/**
 * Get a component type by name.
 */
export function getComponentType(name: string): ComponentType<object> | undefined {
    return componentRegistry.get(name);
}
