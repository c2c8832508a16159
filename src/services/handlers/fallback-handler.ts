import { CommandHandler } from '../../core/interfaces.js';

/**
 * Answers any subcommand of a known family that has no simulation of its own
 */
export const fallbackHandler: CommandHandler = ({ family, subcommand, args, io }) => {
  const line = [family, subcommand, args].filter(part => part.length > 0).join(' ');
  io.out.println(`Simulated output for command: ${line}`);
};
