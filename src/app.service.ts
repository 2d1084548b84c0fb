import { Inject, Injectable } from '@nestjs/common';
import { DatabaseService } from './database/database.service';
import { MenuService } from './menu/menu.service';
import { Terminal, TERMINAL } from './menu/terminal';
import { ConnectionException } from './common/exceptions/students.exceptions';

@Injectable()
export class AppService {
  constructor(
    private readonly databaseService: DatabaseService,
    private readonly menuService: MenuService,
    @Inject(TERMINAL)
    private readonly terminal: Terminal,
  ) {}

  /** Checks the database once, then hands the terminal to the menu. */
  async run(): Promise<void> {
    try {
      await this.databaseService.verifyConnection();
    } catch (error) {
      if (error instanceof ConnectionException) {
        this.terminal.print('[ERROR] Could not connect to database with current configuration:');
        this.terminal.print(error.diagnostic);
        return;
      }
      throw error;
    }

    await this.menuService.run();
  }
}
