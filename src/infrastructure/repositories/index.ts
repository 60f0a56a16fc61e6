export { CsvEmployeeRepository } from './csv-employee.repository';
export { TypeOrmOperationLogRepository } from './operation-log.repository';
export { repositoriesProviders } from './repositories.providers';
