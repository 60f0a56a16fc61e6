export { OperationLogEntity } from './operation-log.orm-entity';
