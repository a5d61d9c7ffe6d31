import type { ExitCode, ProcessTerminator } from '../ports/process-terminator.js';

const EXIT_STATUS: Readonly<Record<ExitCode['kind'], number>> = {
  success: 0,
  failure: 1,
};

export class NodeProcessTerminator implements ProcessTerminator {
  terminate(code: ExitCode): never {
    return process.exit(EXIT_STATUS[code.kind]);
  }
}
