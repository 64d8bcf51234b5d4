// Fixed signature tables for the detection tiers. Table order is significant:
// the first matching entry wins.

export const SSH_PORT = 22;
export const SSH_PORT_RANGE: readonly [number, number] = [20, 30];

export const HTTP_PORTS: ReadonlySet<number> = new Set([
  80, 443, 3000, 3001, 4000, 5000, 8000, 8080, 8443, 8888, 9000,
]);

// Ports where TLS is tried before plain HTTP
export const HTTPS_FIRST_PORTS: ReadonlySet<number> = new Set([443, 8443]);

export interface FrameworkSignature {
  name: string;
  indicators: string[];
}

// Indicators are matched against the lower-cased body and header lines
export const FRAMEWORK_SIGNATURES: readonly FrameworkSignature[] = [
  { name: 'Django', indicators: ['csrftoken', 'django'] },
  { name: 'Flask', indicators: ['flask', 'werkzeug'] },
  { name: 'Express.js', indicators: ['express', 'x-powered-by: express'] },
  { name: 'Apache', indicators: ['apache'] },
  { name: 'Nginx', indicators: ['nginx'] },
  { name: 'React', indicators: ['react', '__react_devtools'] },
  { name: 'Vue.js', indicators: ['vue', '__vue__'] },
  { name: 'Jenkins', indicators: ['jenkins', 'x-jenkins'] },
  { name: 'Grafana', indicators: ['grafana'] },
  { name: 'Prometheus', indicators: ['prometheus'] },
  { name: 'GitLab', indicators: ['gitlab'] },
  { name: 'Jupyter', indicators: ['jupyter', 'notebook'] },
  { name: 'Portainer', indicators: ['portainer'] },
  { name: 'SonarQube', indicators: ['sonarqube'] },
];

export const DATABASE_SERVICES: ReadonlyMap<number, string> = new Map([
  [3306, 'MySQL/MariaDB'],
  [5432, 'PostgreSQL'],
  [6379, 'Redis'],
  [27017, 'MongoDB'],
  [9200, 'Elasticsearch'],
  [5984, 'CouchDB'],
  [8086, 'InfluxDB'],
]);

export interface BannerKeyword {
  keyword: string;
  service: string;
}

export const BANNER_KEYWORDS: readonly BannerKeyword[] = [
  { keyword: 'ssh', service: 'SSH' },
  { keyword: 'http', service: 'HTTP' },
  { keyword: 'html', service: 'HTTP' },
  { keyword: 'ftp', service: 'FTP' },
  { keyword: 'smtp', service: 'SMTP' },
  { keyword: 'pop3', service: 'POP3' },
  { keyword: 'imap', service: 'IMAP' },
  { keyword: 'mysql', service: 'MySQL' },
  { keyword: 'postgresql', service: 'PostgreSQL' },
  { keyword: 'redis', service: 'Redis' },
  { keyword: 'mongodb', service: 'MongoDB' },
  { keyword: 'elastic', service: 'Elasticsearch' },
];

// Last-resort names when no tier produced anything
export const DEFAULT_SERVICES: ReadonlyMap<number, string> = new Map([
  [21, 'FTP'],
  [22, 'SSH'],
  [25, 'SMTP'],
  [80, 'HTTP'],
  [110, 'POP3'],
  [143, 'IMAP'],
  [443, 'HTTPS'],
  [3000, 'Node.js/React'],
  [3001, 'Node.js Alt'],
  [3306, 'MySQL'],
  [5432, 'PostgreSQL'],
  [6379, 'Redis'],
  [8000, 'Django/Python'],
  [8080, 'HTTP-Alt'],
  [8443, 'HTTPS-Alt'],
  [9000, 'SonarQube'],
  [9200, 'Elasticsearch'],
  [27017, 'MongoDB'],
]);

export const UNKNOWN_SERVICE = 'Unknown';
