import { Controller, Get, Header } from '@nestjs/common';
import { RateLimited } from '../../shared/decorators/rate-limited.decorator';
import { StructuredLoggerService } from '../../shared/logging/structured-logger.service';

@Controller()
export class DemoController {
  constructor(private readonly logger: StructuredLoggerService) {}

  @RateLimited()
  @Get('limited')
  @Header('Content-Type', 'text/plain; charset=utf-8')
  limited(): string {
    return 'Request was processed.\n';
  }

  @Get('unlimited')
  @Header('Content-Type', 'text/plain; charset=utf-8')
  unlimited(): string {
    this.logger.log('Request ALLOWED for /unlimited', DemoController.name);
    return 'Unlimited request was processed.\n';
  }
}
