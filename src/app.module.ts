import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';

import { DateVarianceModule } from './modules/date-variance/date-variance.module';
import varianceConfig from './config/variance.config';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      ignoreEnvFile: true,
      load: [varianceConfig],
    }),
    DateVarianceModule,
  ],
})
export class AppModule {}
