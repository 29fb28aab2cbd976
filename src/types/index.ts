/**
 * Shared type definitions for hpl-core
 */

// Re-export error types
export {
    HplException,
    ConstructionError,
    createConstructionError,
    createNotAChildError,
    createImmutableNodeError,
    createRegistryFrozenError,
    createInvalidOptionsError,
    serializeHplError,
} from './errors.js';

export type {
    HplErrorCode,
    HplError,
} from './errors.js';

// Re-export AST types
export { PATTERN_TYPES } from './ast.js';

export type {
    NodeId,
    TruthValue,
    ValueNode,
    NotNode,
    AndNode,
    OrNode,
    ComparisonOperator,
    ComparisonNode,
    ArithmeticOperator,
    ArithmeticNode,
    LiteralValue,
    LiteralNode,
    PathSegment,
    FieldAccessNode,
    VariableNode,
    FunctionCallNode,
    SetNode,
    RangeNode,
    Quantifier,
    QuantifierNode,
    Expression,
    PredicateNode,
    AtomicEventNode,
    EventDisjunctionNode,
    EventNode,
    ScopeType,
    ScopeNode,
    PatternType,
    PatternNode,
    PropertyNode,
    SpecificationNode,
    AstNode,
    AstNodeKind,
    NodeOfKind,
} from './ast.js';

// Re-export diagnostics
export {
    DIAGNOSTIC_SEVERITY,
    createDiagnostic,
} from './diagnostics.js';

export type {
    DiagnosticCode,
    Severity,
    DiagnosticDetails,
    Diagnostic,
    ValidationReport,
    PropertyReport,
    SpecificationReport,
} from './diagnostics.js';

// Re-export value types
export * from './valueTypes.js';

// Re-export schemas
export {
    fieldTypeSchema,
    messageTypeSchema,
    channelSchemasSchema,
    isArrayFieldType,
    isMessageType,
    parseChannelSchemas,
} from './schema.js';

export type {
    PrimitiveFieldType,
    ArrayFieldType,
    MessageType,
    FieldType,
    ChannelSchemas,
} from './schema.js';

// Re-export property metadata
export { jsonValueSchema, propertyMetadataSchema, parsePropertyMetadata } from './metadata.js';

export type { JsonValue, PropertyMetadata } from './metadata.js';

// Re-export options
export {
    DEFAULTS,
    verbositySchema,
    patternRuleOverrideSchema,
    validatorOptionsSchema,
    parseValidatorOptions,
} from './options.js';

export type {
    Verbosity,
    ValidatorOptions,
    ResolvedValidatorOptions,
    PatternRuleOverride,
} from './options.js';
