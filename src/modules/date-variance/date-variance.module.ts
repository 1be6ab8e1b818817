import { Module } from '@nestjs/common';
import { DateVarianceService } from './application/date-variance.service';
import { DateVarianceCommand } from './infrastructure/date-variance.command';

// Random source
import { RANDOM_SOURCE } from '../../shared/domain/random.port';
import { CryptoRandomSource } from '../../shared/infrastructure/crypto-random';

// Output
import { OUTPUT_PORT } from '../../shared/ports/output.port';
import { StdoutOutput } from '../../shared/infrastructure/stdout-output';

@Module({
  providers: [
    DateVarianceService,
    DateVarianceCommand,

    // Random source (infrastructure adapter)
    {
      provide: RANDOM_SOURCE,
      useClass: CryptoRandomSource,
    },

    // Output (infrastructure adapter)
    {
      provide: OUTPUT_PORT,
      useClass: StdoutOutput,
    },
  ],
  exports: [DateVarianceCommand],
})
export class DateVarianceModule {}
