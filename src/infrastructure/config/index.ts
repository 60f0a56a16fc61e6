export { Environment, EnvironmentVariables, validate } from './env.validation';
