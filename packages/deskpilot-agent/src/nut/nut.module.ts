import { Module } from '@nestjs/common';
import { INPUT_INJECTOR, SCREEN_CAPTURER } from './nut.constants';
import { NutService } from './nut.service';

@Module({
  providers: [
    NutService,
    { provide: INPUT_INJECTOR, useExisting: NutService },
    { provide: SCREEN_CAPTURER, useExisting: NutService },
  ],
  exports: [INPUT_INJECTOR, SCREEN_CAPTURER],
})
export class NutModule {}
