export { InputUnavailableError } from './input-unavailable-error';
