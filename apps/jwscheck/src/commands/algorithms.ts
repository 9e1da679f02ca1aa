/**
 * Algorithms command
 */

import { isVerifiable, listAlgorithms } from '@jwscheck/core';
import { Command } from 'commander';
import { printData } from '../utils/output';

export function createAlgorithmsCommand(): Command {
  return new Command('algorithms').description('List supported algorithms').action(() => {
    const rows = listAlgorithms().map((algorithm) => ({
      name: algorithm.name,
      family: algorithm.family,
      primitive: algorithm.primitive,
      verifiable: isVerifiable(algorithm),
    }));

    printData(rows, {
      headers: ['NAME', 'FAMILY', 'PRIMITIVE', 'VERIFIABLE'],
      getRow: (row) => [row.name, row.family, row.primitive || '-', row.verifiable ? 'yes' : 'no'],
    });
  });
}
