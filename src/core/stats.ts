export const WEEK_DAYS = ["Sun", "Mon", "Tue", "Wed", "Thu", "Fri", "Sat"] as const;

export type WeekDay = (typeof WEEK_DAYS)[number];

export type HourlyAverage = {
  averages: number[];
  interactions: number;
};

export type DayAverage = {
  hours: number[];
  interactions: number;
};

export type WeeklyAverage = Partial<Record<WeekDay, DayAverage>>;

export type AlertRecord = {
  sigid: number;
  level: number;
  times: number;
};

export type TotalsRecord = {
  hour: number;
  alerts: AlertRecord[];
  totalAlerts: number;
  events: number;
  syscheck: number;
  firewall: number;
};

export type TotalsResult = {
  failed: boolean;
  records: TotalsRecord[];
};

export type DaemonStats = Record<string, number>;

export type DaemonSocketReply = Record<string, unknown>;
