/**
 * Registers every eqia subcommand on the program
 */

import type { Command } from 'commander';
import { registerCrimeCommand } from './crime.js';
import { registerDeprivationCommand } from './deprivation.js';
import { registerHomelessnessCommand } from './homelessness.js';
import { registerPopulationCommand } from './population.js';
import { registerProfileCommand } from './profile.js';
import { registerStationsCommand } from './stations.js';

export function registerCommands(program: Command): void {
  registerStationsCommand(program);
  registerProfileCommand(program);
  registerDeprivationCommand(program);
  registerHomelessnessCommand(program);
  registerCrimeCommand(program);
  registerPopulationCommand(program);
}
