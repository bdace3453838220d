// League types
export type PlayerStatus = 'active' | 'injured';

export interface Manager {
  id: number;
  name: string;
  teamName: string;
}

export interface Player {
  id: number;
  name: string;
  proTeam: string;
  status: PlayerStatus;
}

// Schedule types
export interface GameScheduleEntry {
  id: number;
  /** League calendar date, YYYY-MM-DD */
  gameDate: string;
  /** ISO timestamp of tip-off */
  startTime: string;
  homeTeam: string | null;
  awayTeam: string | null;
}

// Lineup types
export type LineupSlotStatus = 'active' | 'bench';
export type LineupState = 'UNSET' | 'SET' | 'LOCKED';
export type LineupProvenance = 'Explicit' | 'Inherited' | 'Default';

export interface LineupEntry {
  playerId: number;
  status: LineupSlotStatus;
}

export interface ResolvedLineup {
  managerId: number;
  date: string;
  activePlayerIds: number[];
  provenance: LineupProvenance;
  /** Date the lineup was explicitly set on; null for Default */
  sourceDate: string | null;
}

// Scoring types
export interface ScoreBreakdown {
  category: string;
  value: number;
  points: number;
}

export interface PlayerGameScore {
  gameId: number;
  playerId: number;
  gameDate: string;
  fantasyPoints: number;
}

export interface ManagerDailyScore {
  managerId: number;
  gameDate: string;
  totalPoints: number;
  activePlayersCount: number;
}

// Standings
export interface StandingsEntry {
  rank: number;
  managerId: number;
  managerName: string;
  teamName: string;
  totalPoints: number;
  daysWithScores: number;
  avgPointsPerDay: number;
}

// Tournament
export interface TournamentRound {
  roundNumber: number;
  name: string;
  startDate: string;
  endDate: string;
}

export interface TournamentNomination {
  managerId: number;
  playerId: number;
  seed: number | null;
  nominatedAt: string;
}
