import { Provider } from '@nestjs/common';
import { EMPLOYEE_REPOSITORY, OPERATION_LOG_REPOSITORY } from '@/domain/repositories';
import { CsvEmployeeRepository } from './csv-employee.repository';
import { TypeOrmOperationLogRepository } from './operation-log.repository';

export const repositoriesProviders: Provider[] = [
  {
    provide: EMPLOYEE_REPOSITORY,
    useClass: CsvEmployeeRepository,
  },
  {
    provide: OPERATION_LOG_REPOSITORY,
    useClass: TypeOrmOperationLogRepository,
  },
];
