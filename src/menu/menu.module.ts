import { Module } from '@nestjs/common';
import { StudentsModule } from '../student/student.module';
import { MenuService } from './menu.service';
import { PromptTerminal } from './prompt-terminal';
import { TERMINAL } from './terminal';

@Module({
  imports: [StudentsModule],
  providers: [MenuService, { provide: TERMINAL, useClass: PromptTerminal }],
  exports: [MenuService, TERMINAL],
})
export class MenuModule {}
