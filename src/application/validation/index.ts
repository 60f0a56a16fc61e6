export { validateDto } from './validate-dto';
