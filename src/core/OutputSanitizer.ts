/**
 * OutputSanitizer - Redacts secrets from text before it is written to logs.
 *
 * Command output on a support machine can carry credentials (Wi-Fi keys from
 * `netsh wlan show profile key=clear`, tokens echoed by installers, API keys
 * in environment dumps). Every transcript line passes through here first.
 *
 * Singleton pattern - use getSanitizer() to access.
 */

export interface SanitizationPattern {
  regex: RegExp;
  replacement: string;
  description: string;
}

export class OutputSanitizer {
  private static instance: OutputSanitizer | undefined;
  private patterns: SanitizationPattern[];
  private enabled: boolean = true;

  private constructor() {
    this.patterns = [
      // Groq keys (gsk_...)
      {
        regex: /gsk_[A-Za-z0-9]{20,}/g,
        replacement: 'gsk_***REDACTED***',
        description: 'Groq API key'
      },
      // OpenAI-style keys (sk-proj-... or sk-...)
      {
        regex: /sk-(?:proj-)?[A-Za-z0-9-_]{20,}/g,
        replacement: 'sk-***REDACTED***',
        description: 'OpenAI-style API key'
      },
      {
        regex: /Bearer\s+[A-Za-z0-9._-]{20,}/gi,
        replacement: 'Bearer ***REDACTED***',
        description: 'Bearer token'
      },
      // netsh wlan show profile ... key=clear
      {
        regex: /(Key Content\s*:\s*)\S.*$/gim,
        replacement: '$1***REDACTED***',
        description: 'Wireless network key'
      },
      {
        regex: /(password|passwd|pwd|secret|api_key|apikey|token)\s*[:=]\s*['"][^'"]{4,}['"]/gi,
        replacement: '$1: "***REDACTED***"',
        description: 'Inline secret assignment'
      },
      {
        regex: /(LLM_API_KEY|GROQ_API_KEY|OPENAI_API_KEY)\s*=\s*\S+/g,
        replacement: '$1=***REDACTED***',
        description: 'Environment variable'
      }
    ];
  }

  /**
   * Get the singleton instance.
   */
  static getInstance(): OutputSanitizer {
    if (!OutputSanitizer.instance) {
      OutputSanitizer.instance = new OutputSanitizer();
    }
    return OutputSanitizer.instance;
  }

  /**
   * Sanitize text by redacting any detected secrets.
   */
  sanitize(text: string): string {
    if (!this.enabled || !text) {
      return text;
    }

    let sanitized = text;
    for (const pattern of this.patterns) {
      sanitized = sanitized.replace(pattern.regex, pattern.replacement);
    }
    return sanitized;
  }

  setEnabled(enabled: boolean): void {
    this.enabled = enabled;
  }

  isEnabled(): boolean {
    return this.enabled;
  }
}

/**
 * Get the singleton OutputSanitizer instance.
 */
export function getSanitizer(): OutputSanitizer {
  return OutputSanitizer.getInstance();
}

/**
 * Convenience function to sanitize text.
 */
export function sanitize(text: string): string {
  return getSanitizer().sanitize(text);
}

/**
 * Mask an environment value for display when its key looks sensitive.
 * `abcdef123` -> `abc***23`; short values collapse to `***`.
 */
export function maskEnvValue(key: string, value: string): string {
  const upper = key.toUpperCase();
  if (!['KEY', 'TOKEN', 'SECRET', 'PASSWORD'].some(term => upper.includes(term))) {
    return value;
  }
  if (!value) {
    return '';
  }
  return value.length > 5 ? `${value.slice(0, 3)}***${value.slice(-2)}` : '***';
}
