export interface Capabilities {
  enhancedHttp: boolean;
  richOutput: boolean;
}

export interface DependencyStatus {
  name: string;
  feature: string;
  available: boolean;
}
