import { directGroup } from './direct.js';
import { externalGroup } from './external.js';
import { isolatedGroup } from './isolated.js';
import type { CommandTree } from './registry.js';

export const networkCommands: CommandTree = {
  name: 'network',
  summary: 'work with vcd networks',
  groups: [externalGroup, directGroup, isolatedGroup],
};
