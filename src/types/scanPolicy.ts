export enum SymlinkPolicy {
  DONT_FOLLOW = 'DONT_FOLLOW',
  FOLLOW = 'FOLLOW'
}

export interface IgnoreRules {
  glob: string[];
  regex: string[];
}
