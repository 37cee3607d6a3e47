export {
  CollaboratorUnavailableError,
  ConfigurationInvalidError,
  PageProcessingError,
  TextProcessingError,
} from './text-processing-error';
