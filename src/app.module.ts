import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { AnalyticsService, EmployeeService } from './application/services';
import { validate } from './infrastructure/config';
import { OperationLogEntity } from './infrastructure/database/entities';
import { createTypeOrmOptions } from './infrastructure/database/typeorm.config';
import { loggerProviders } from './infrastructure/logger/logger.providers';
import { repositoriesProviders } from './infrastructure/repositories';
import { AnalyticsMenu, EmployeeCli } from './presentation/cli';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
      validate,
    }),
    TypeOrmModule.forRootAsync({
      inject: [ConfigService],
      useFactory: createTypeOrmOptions,
    }),
    TypeOrmModule.forFeature([OperationLogEntity]),
  ],
  providers: [
    ...repositoriesProviders,
    ...loggerProviders,
    AnalyticsService,
    EmployeeService,
    AnalyticsMenu,
    EmployeeCli,
  ],
})
export class AppModule {}
