import { Injectable } from '@nestjs/common';
import type { OutputPort } from '../ports/output.port';

@Injectable()
export class StdoutOutput implements OutputPort {
  write(text: string): void {
    process.stdout.write(text);
  }
}
