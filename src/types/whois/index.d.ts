// The whois package ships no type declarations and has no @types package.
declare module 'whois' {
  export interface LookupOptions {
    server?: string | { host: string; port?: number };
    follow?: number;
    timeout?: number;
    verbose?: boolean;
    bind?: string;
  }

  export interface VerboseLookupEntry {
    server: string;
    data: string;
  }

  export type LookupCallback = (error: Error | null, data: string | VerboseLookupEntry[]) => void;

  export function lookup(addr: string, done: LookupCallback): void;
  export function lookup(addr: string, options: LookupOptions, done: LookupCallback): void;
}
