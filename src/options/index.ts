export { parseBlockDescriptor } from './blockDescriptor';
export { declareOptions } from './optionTable';
export type { ArgumentFileLoader } from './optionTable';
export { CommandLine, classifyInputFile } from './commandLine';
export { COMMAND_LINE_URI, DEFAULT_SETTINGS, LANG_CODES, VERSION } from './constants';
export type { FrontendSettings } from './constants';
export {
    ErrorReporter,
    FatalError,
    commandLineLocation,
    formatDiagnostic,
    isCommandLine
} from './diagnostics';
export type { ReportedDiagnostic } from './diagnostics';
export { DirectoryCache } from './dirCache';
export { lexArgumentFile } from './lexer';
export { OptionParser, normalizeOptionName } from './optionParser';
export { Options } from './options';
export { DirectoryList, SearchPath } from './searchPath';
export type * from './types';
