export enum SchedulerState {
  IDLE = 'idle',
  WAITING_FOR_MARKET_OPEN = 'waiting-for-market-open',
  ACTIVE_POLLING = 'active-polling',
  SLEEPING_BETWEEN_UPDATES = 'sleeping-between-updates',
  SHUTTING_DOWN = 'shutting-down',
}
