import type { OperationDefinition } from './types.js';
import { rename } from './operations/naming.js';
import { addUsing, removeUnusedUsings, sortUsings } from './operations/usings.js';
import { addFileHeader } from './operations/header.js';
import {
    convertNumericLiteral,
    convertStringFormat,
    convertStringLiteral,
    convertToInterpolatedString
} from './operations/literals.js';
import {
    addDebuggerDisplay,
    convertAutoProperty,
    encapsulateField,
    generateDefaultConstructor,
    makeLocalFunctionStatic,
    makeMemberStatic,
    syncTypeAndFile
} from './operations/members.js';
import {
    convertForLoop,
    invertIfStatement,
    reverseForStatement,
    splitOrMergeIfStatements,
    useExplicitType,
    useImplicitType
} from './operations/statements.js';
import {
    addAwait,
    addExplicitCast,
    addNamedArgument,
    convertCastToAsExpression,
    invertConditionalExpressions,
    wrapBinaryExpressions
} from './operations/expressions.js';
import { extractMethod } from './operations/extraction.js';
import { inlineTemporaryVariable, introduceLocalVariable, moveDeclarationNearReference } from './operations/locals.js';
import { findDependencies, findDuplicateCode, findReferences, findSymbols, findUsages } from './operations/analysis.js';

/**
 * Every operation the engine offers, in the order tools are listed.
 * `parameters` names the operation-specific arguments each handler reads.
 */
export const OPERATIONS: readonly OperationDefinition[] = [
    { id: 'RenameCommand', parameters: ['old_name', 'new_name'], run: rename },
    { id: 'AddUsingCommand', parameters: ['namespace'], run: addUsing },
    { id: 'SortUsingsCommand', parameters: ['system_first'], run: sortUsings },
    { id: 'RemoveUnusedUsingsCommand', parameters: [], run: removeUnusedUsings },
    { id: 'AddFileHeaderCommand', parameters: ['header_text', 'copyright'], run: addFileHeader },
    { id: 'AddExplicitCastCommand', parameters: ['cast_type'], run: addExplicitCast },
    { id: 'AddAwaitCommand', parameters: [], run: addAwait },
    { id: 'AddDebuggerDisplayCommand', parameters: ['display_format'], run: addDebuggerDisplay },
    { id: 'ConvertNumericLiteralCommand', parameters: ['target_format'], run: convertNumericLiteral },
    { id: 'ConvertStringLiteralCommand', parameters: [], run: convertStringLiteral },
    { id: 'ConvertStringFormatCommand', parameters: [], run: convertStringFormat },
    { id: 'ConvertToInterpolatedStringCommand', parameters: [], run: convertToInterpolatedString },
    { id: 'ConvertAutoPropertyCommand', parameters: [], run: convertAutoProperty },
    { id: 'ReverseForStatementCommand', parameters: [], run: reverseForStatement },
    { id: 'InvertIfStatementCommand', parameters: [], run: invertIfStatement },
    { id: 'InvertConditionalExpressionsCommand', parameters: [], run: invertConditionalExpressions },
    { id: 'MakeMemberStaticCommand', parameters: [], run: makeMemberStatic },
    { id: 'MakeLocalFunctionStaticCommand', parameters: [], run: makeLocalFunctionStatic },
    { id: 'GenerateDefaultConstructorCommand', parameters: [], run: generateDefaultConstructor },
    { id: 'UseExplicitTypeCommand', parameters: [], run: useExplicitType },
    { id: 'UseImplicitTypeCommand', parameters: [], run: useImplicitType },
    { id: 'WrapBinaryExpressionsCommand', parameters: [], run: wrapBinaryExpressions },
    { id: 'ExtractMethodCommand', parameters: ['method_name', 'end_line_number'], run: extractMethod },
    { id: 'EncapsulateFieldCommand', parameters: [], run: encapsulateField },
    { id: 'IntroduceLocalVariableCommand', parameters: ['variable_name'], run: introduceLocalVariable },
    { id: 'InlineTemporaryVariableCommand', parameters: [], run: inlineTemporaryVariable },
    { id: 'MoveDeclarationNearReferenceCommand', parameters: [], run: moveDeclarationNearReference },
    { id: 'SplitOrMergeIfStatementsCommand', parameters: ['operation'], run: splitOrMergeIfStatements },
    { id: 'ConvertForLoopCommand', parameters: ['target_type'], run: convertForLoop },
    { id: 'AddNamedArgumentCommand', parameters: ['parameter_index'], run: addNamedArgument },
    { id: 'ConvertCastToAsExpressionCommand', parameters: ['target'], run: convertCastToAsExpression },
    { id: 'SyncTypeAndFileCommand', parameters: [], run: syncTypeAndFile },
    { id: 'FindSymbolsCommand', parameters: ['pattern'], run: findSymbols },
    { id: 'FindReferencesCommand', parameters: [], run: findReferences },
    { id: 'FindUsagesCommand', parameters: ['symbol_name'], run: findUsages },
    { id: 'FindDuplicateCodeCommand', parameters: ['min_lines'], run: findDuplicateCode },
    { id: 'FindDependenciesCommand', parameters: ['type_name'], run: findDependencies }
];
