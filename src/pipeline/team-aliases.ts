import type { TeamAliasTable } from './team-resolver.js';

/**
 * Monitored Belo Horizonte clubs. The canonical name is always matched by
 * itself, so it does not need repeating in `aliases`.
 */
export const MINEIRO_TEAMS: TeamAliasTable = [
  {
    name: 'Cruzeiro',
    abbr: 'CRU',
    aliases: ['Cruzeiro EC', 'Cruzeiro Esporte Clube', 'Raposa'],
  },
  {
    name: 'Atletico-MG',
    abbr: 'CAM',
    aliases: [
      'Atlético-MG',
      'Atlético Mineiro',
      'Atletico Mineiro',
      'Clube Atlético Mineiro',
      'Atlético',
      'Galo',
    ],
  },
  {
    name: 'America-MG',
    abbr: 'AME',
    aliases: [
      'América-MG',
      'América Mineiro',
      'America Mineiro',
      'América Futebol Clube',
      'América',
      'Coelho',
    ],
  },
];
