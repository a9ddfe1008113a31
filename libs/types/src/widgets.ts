/**
 * Widget data shapes returned by the public-API fetchers
 */

export interface WeatherReport {
  temp_c: number;
  temp_f: number;
  feels_like_c: number;
  feels_like_f: number;
  condition: string;
  humidity: number;
  wind_mph: number;
  /** 16-point compass direction (N, NNE, ...) */
  wind_dir: string;
  city: string;
  /** Font Awesome icon class */
  icon: string;
}

export interface HackerNewsStory {
  title: string;
  url: string;
  score: number;
  comments: number;
  hn_url: string;
}

export type HeadlineSource = 'Reddit' | 'HN';

export interface Headline {
  title: string;
  url: string;
  source: HeadlineSource;
}

export interface RedditPost {
  title: string;
  url: string;
  score: number;
  comments: number;
  subreddit: string;
  reddit_url: string;
  time_ago: string;
}

export interface CryptoPrice {
  id: string;
  name: string;
  price: number;
  change_24h: number;
}

/** USGS PAGER alert level */
export type QuakeAlert = 'green' | 'yellow' | 'orange' | 'red';

export interface Earthquake {
  magnitude: number;
  place: string;
  /** HH:MM UTC */
  time: string;
  /** YYYY-MM-DD */
  date: string;
  depth_km: number;
  url: string;
  alert: QuakeAlert | null;
  tsunami: number;
  felt: number;
}

export type DisasterAlertLevel = 'green' | 'orange' | 'red';

export interface DisasterAlert {
  title: string;
  description: string;
  link: string;
  pub_date: string;
  alert_level: DisasterAlertLevel;
  event_type: string;
}

export type ThreatLevel = 1 | 2 | 3 | 4 | 5;

export interface ThreatStatus {
  level: string;
  level_num: ThreatLevel;
  status: string;
  color: string;
  earthquakes: Earthquake[];
  disasters: DisasterAlert[];
  alerts_count: number;
}

// ============================================================================
// Host collaborators
// ============================================================================

export interface ContainerSummary {
  id: string;
  name: string;
  status: string;
  image: string;
}

export interface SystemStats {
  cpu_percent: number;
  mem_percent: number;
  mem_used: number;
  mem_total: number;
}

export interface SystemInfo {
  hostname: string;
  platform: string;
  uptime_seconds: number;
  cpu_cores: number;
  load_average: number[];
  containers_total?: number;
  containers_running?: number;
}

export interface IconEntry {
  name: string;
  url: string;
}

// ============================================================================
// Themes
// ============================================================================

export interface ThemeColors {
  black: string;
  dark: string;
  card: string;
  border: string;
  text: string;
  muted: string;
  accent: string;
  success: string;
  error: string;
}

export interface Theme {
  name: string;
  colors: ThemeColors;
}
