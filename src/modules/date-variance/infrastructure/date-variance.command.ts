import { Inject, Injectable, Logger, ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Command, CommanderError } from 'commander';
import { DateVarianceService } from '../application/date-variance.service';
import { InjectVarianceDto } from '../application/dto/inject-variance.dto';
import {
  DomainError,
  InvalidOptionsError,
} from '../../../shared/domain/errors';
import type { OutputPort } from '../../../shared/ports/output.port';
import { OUTPUT_PORT } from '../../../shared/ports/output.port';
import type { VarianceConfig } from '../../../config/variance.config';

const DESCRIPTION =
  'Introduces a random variance within a specified range to date values, ' +
  'preserving temporal relationships while obscuring exact dates.';

/** Raw option values as commander hands them over */
type CliOptions = {
  range: string;
  maxRange: string;
  format: string;
};

/** Shape shared by class-validator errors and their nested children */
interface ConstraintViolation {
  constraints?: Record<string, string>;
  children?: ConstraintViolation[];
}

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;

function collectConstraintMessages(errors: ConstraintViolation[]): string[] {
  return errors.flatMap((error) => [
    ...Object.values(error.constraints ?? {}),
    ...collectConstraintMessages(error.children ?? []),
  ]);
}

/**
 * CLI adapter: argv in, one line out, exit code back.
 *
 * Every failure is terminal. It is logged once through the Nest logger
 * (stderr, with timestamp and level) and mapped to exit code 1.
 */
@Injectable()
export class DateVarianceCommand {
  private readonly logger = new Logger(DateVarianceCommand.name);

  private readonly validationPipe = new ValidationPipe({
    whitelist: true,
    forbidNonWhitelisted: true,
    transform: true,
    exceptionFactory: (errors) =>
      new InvalidOptionsError(collectConstraintMessages(errors)),
  });

  constructor(
    private readonly dateVarianceService: DateVarianceService,
    private readonly configService: ConfigService,
    @Inject(OUTPUT_PORT)
    private readonly output: OutputPort,
  ) {}

  /**
   * Run one invocation. `args` excludes the node binary and script path.
   */
  async run(args: string[]): Promise<number> {
    try {
      const input: InjectVarianceDto = await this.validationPipe.transform(
        this.parseArguments(args),
        { type: 'body', metatype: InjectVarianceDto },
      );

      const result = this.dateVarianceService.inject(input);
      this.output.write(`${result.formatted}\n`);

      return EXIT_SUCCESS;
    } catch (error) {
      return this.handleError(error);
    }
  }

  buildProgram(): Command {
    const defaults = this.configService.getOrThrow<VarianceConfig>('variance');

    return new Command('date-variance')
      .description(DESCRIPTION)
      .argument('<date>', 'The date to modify (YYYY-MM-DD).')
      .option(
        '-r, --range <days>',
        'The range of days to vary the date by. A negative value behaves like its absolute value.',
        String(defaults.range),
      )
      .option(
        '-m, --max-range <days>',
        'Ceiling on |range|, 0 or more.',
        String(defaults.maxRange),
      )
      .option(
        '-f, --format <pattern>',
        'The output date format, using strftime directives.',
        defaults.format,
      )
      .allowExcessArguments(false)
      .exitOverride()
      .configureOutput({
        writeOut: (text) => this.output.write(text),
        outputError: (text) => this.logger.error(text.trim()),
      });
  }

  private parseArguments(args: string[]): Record<string, unknown> {
    const program = this.buildProgram();
    program.parse(args, { from: 'user' });

    const [date] = program.args;
    return { date, ...program.opts<CliOptions>() };
  }

  private handleError(error: unknown): number {
    if (error instanceof CommanderError) {
      // Already reported by commander; --help exits with 0
      return error.exitCode === EXIT_SUCCESS ? EXIT_SUCCESS : EXIT_FAILURE;
    }

    if (error instanceof DomainError) {
      this.logger.error(`Error: ${error.message}`);
      return EXIT_FAILURE;
    }

    const message = error instanceof Error ? error.message : String(error);
    this.logger.error(`An unexpected error occurred: ${message}`);
    return EXIT_FAILURE;
  }
}
