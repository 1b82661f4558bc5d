export {
  parseConfigYaml,
  parseConfigObject,
  loadConfigFile,
  findSection,
  collectSections,
} from './parser.js';
export type {
  ConfigDocument,
  Section,
  StepDefinition,
  ShellStep,
  CallStep,
  ShellStepEntry,
  CallStepEntry,
  SectionEntry,
} from './types.js';
export { sectionSchema, shellStepSchema, callStepSchema, normalizeStep, SECTION_KEY } from './types.js';
