/**
 * Built-in tool catalog.
 *
 * The baseline set of tools permitted to execute. Operators extend it via
 * `tools.extra`; extensions can never replace a built-in entry.
 */

import type { ToolCategory } from '../types/index.js';

/** Static definition of a built-in tool */
export interface ToolDefinition {
  name: string;
  /** Executable name, when it differs from the tool name */
  binary?: string;
  category: ToolCategory;
  description: string;
  /** Per-tool default timeout in seconds, still capped by the global maximum */
  defaultTimeoutSec?: number;
}

/** Tool names: letters, digits, dot, underscore, dash; 1-64 characters */
export const TOOL_NAME_PATTERN = /^[A-Za-z0-9._-]{1,64}$/;

export const BUILTIN_TOOLS: readonly ToolDefinition[] = [
  // Network scanning
  { name: 'nmap', category: 'network_scanning', description: 'Network exploration and port scanner', defaultTimeoutSec: 300 },
  { name: 'ping', category: 'diagnostics', description: 'ICMP echo requests', defaultTimeoutSec: 30 },
  { name: 'traceroute', category: 'diagnostics', description: 'Trace the route packets take to a host', defaultTimeoutSec: 60 },
  { name: 'netstat', category: 'diagnostics', description: 'Network connections and routing tables', defaultTimeoutSec: 30 },
  { name: 'ss', category: 'diagnostics', description: 'Socket statistics', defaultTimeoutSec: 30 },

  // Web
  { name: 'nikto', category: 'web', description: 'Web server vulnerability scanner', defaultTimeoutSec: 300 },
  { name: 'sqlmap', category: 'web', description: 'SQL injection detection and exploitation', defaultTimeoutSec: 300 },
  { name: 'gobuster', category: 'web', description: 'Directory, DNS and vhost brute forcing', defaultTimeoutSec: 300 },
  { name: 'dirb', category: 'web', description: 'Web content scanner', defaultTimeoutSec: 300 },
  { name: 'wfuzz', category: 'web', description: 'Web application fuzzer', defaultTimeoutSec: 300 },
  { name: 'cewl', category: 'web', description: 'Custom word list generator from a website' },

  // Passwords
  { name: 'hydra', category: 'password', description: 'Parallelized network login cracker', defaultTimeoutSec: 300 },
  { name: 'john', category: 'password', description: 'John the Ripper password cracker', defaultTimeoutSec: 300 },
  { name: 'hashcat', category: 'password', description: 'Advanced password recovery', defaultTimeoutSec: 300 },
  { name: 'crunch', category: 'password', description: 'Word list generator' },
  { name: 'medusa', category: 'password', description: 'Parallel network login auditor', defaultTimeoutSec: 300 },
  { name: 'ncrack', category: 'password', description: 'Network authentication cracking tool', defaultTimeoutSec: 300 },

  // Wireless
  { name: 'aircrack-ng', category: 'wireless', description: '802.11 WEP and WPA-PSK key cracking', defaultTimeoutSec: 300 },

  // Exploitation
  {
    name: 'metasploit-framework',
    binary: 'msfconsole',
    category: 'exploitation',
    description: 'Metasploit console (non-interactive use only)',
    defaultTimeoutSec: 300,
  },

  // Enumeration
  { name: 'enum4linux', category: 'enumeration', description: 'Windows and Samba enumeration' },
  { name: 'smbclient', category: 'enumeration', description: 'SMB/CIFS client' },
  { name: 'rpcclient', category: 'enumeration', description: 'MS-RPC client' },
  { name: 'ldapsearch', category: 'enumeration', description: 'LDAP search tool' },

  // DNS
  { name: 'dig', category: 'dns', description: 'DNS lookup utility', defaultTimeoutSec: 30 },
  { name: 'nslookup', category: 'dns', description: 'Query internet name servers', defaultTimeoutSec: 30 },
  { name: 'whois', category: 'dns', description: 'Domain registration lookup', defaultTimeoutSec: 30 },
];
