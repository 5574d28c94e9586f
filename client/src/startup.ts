import type { ConfigValidationResult } from './config';

export interface StartupCheck {
  name: string;
  passed: boolean;
  message: string;
  required?: boolean;
}

export interface StartupReport {
  checks: StartupCheck[];
  ok: boolean;
}

function checkFrameLoop(): StartupCheck {
  if (typeof window === 'undefined' || typeof window.requestAnimationFrame !== 'function') {
    return {
      name: 'frame-loop',
      passed: false,
      message: 'requestAnimationFrame is missing',
      required: true,
    };
  }
  return { name: 'frame-loop', passed: true, message: 'requestAnimationFrame is present', required: true };
}

function checkWebGL(): StartupCheck {
  if (typeof document === 'undefined') {
    return {
      name: 'webgl',
      passed: false,
      message: 'Document API is not available',
      required: true,
    };
  }

  const canvas = document.createElement('canvas');
  const context = canvas.getContext('webgl2') ?? canvas.getContext('webgl');

  return {
    name: 'webgl',
    passed: context !== null,
    message: context ? 'WebGL context available' : 'WebGL context unavailable',
    required: true,
  };
}

/** Invalid config is survivable: main.ts falls back to defaults. */
function checkConfig(result: ConfigValidationResult): StartupCheck {
  return {
    name: 'runtime-config',
    passed: result.valid,
    message: result.valid ? 'Runtime config is valid' : `Runtime config rejected: ${result.errors.join('; ')}`,
    required: false,
  };
}

export function getStartupChecks(config: ConfigValidationResult): StartupReport {
  const checks: StartupCheck[] = [checkFrameLoop(), checkWebGL(), checkConfig(config)];

  return {
    checks,
    ok: checks.every((check) => (check.required === false ? true : check.passed)),
  };
}

export function summarizeStartupChecks(report: StartupReport): string {
  if (report.ok) {
    return 'Startup checks: all passed';
  }

  const failures = report.checks.filter((c) => !c.passed).map((c) => c.name).join(', ');
  return `Startup checks: failed (${failures})`;
}
