export { extractContractDocstring } from './docstring.js'
export { extractEnums } from './enums.js'
export { extractConstants } from './constants.js'
export { extractStructs } from './structs.js'
export { extractEvents, parseEventField } from './events.js'
export { extractVariables } from './variables.js'
export { extractFunctions, decoratorsAbove, type ExtractedFunctions } from './functions.js'
export { parseParameter, splitDeclaration, type Parsed } from './fields.js'
