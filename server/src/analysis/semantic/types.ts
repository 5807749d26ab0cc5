export enum VariableType {
    Int = 'int',
    String = 'string',
    Bool = 'bool',
    Unknown = 'unknown'
}

export interface Variable {
    name: string;
    type: VariableType;
    /** line of the assignment that last defined it */
    line: number;
}

/**
 * One flat table for the whole unit: no scopes, last write wins.
 * Function parameters are never entered.
 */
export type VariableTable = Map<string, Variable>;
