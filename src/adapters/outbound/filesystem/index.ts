export {
  YamlErrorPatternRepository,
  ErrorPatternFileError,
  createYamlErrorPatternRepository,
} from './yaml-error-pattern-repository.js';
