import type { Value } from '../utils';
import type { AbstractCommand } from '../classes/AbstractCommand';

export type DataType = 'string' | 'number' | 'boolean' | 'binary' | 'duration' | 'list' | 'map' | 'any';

export type FormInputType =
    | 'text'
    | 'number'
    | 'textarea'
    | 'select'
    | 'checkbox'
    | 'file'
    | 'json'
    | 'code';

export interface ParameterMetadata {
    name: string;
    prefix?: string; // Written as `prefix:value` when set
    label?: string;
    dataType: DataType;
    description: string;
    formInputType: FormInputType;
    required?: boolean;
    defaultValue?: Value;
}

export interface CommandMetadata {
    description: string;
    parameters: ParameterMetadata[];
    saveKeys?: string[]; // Result keys readable through <entry[name].key> after save:name
    example?: string;
}

export interface ModuleMetadata {
    description: string;
    commands: string[];
}

/**
 * A group of commands loaded into the engine together
 */
export interface CommandModule {
    name: string;
    commands: AbstractCommand[];
    commandMetadata: Record<string, CommandMetadata>;
    moduleMetadata: ModuleMetadata;
}
