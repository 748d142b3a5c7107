/**
 * Command Context - Lazy service creation and initialization
 *
 * This is NOT a framework - just an object that knows how to create the CAD
 * session, scorer and engine a command needs. Tests pass overrides instead of
 * touching FreeCAD.
 */

import { OptimizationEngine, type CadSessionPort, type QualityScorerPort } from '@cae/optimizer';
import { FreeCadBridge, FreeCadSession, GeometryQualityScorer, MockCadSession } from '@cae/cad';
import { getFreeCadConfig, loadConfigFromYaml } from '@cae/utils';

export type CadKind = 'freecad' | 'mock';

/**
 * Services available in command context
 */
export interface CommandServices {
  cadSession(kind: CadKind): CadSessionPort;
  qualityScorer(): QualityScorerPort;
  optimizationEngine(): OptimizationEngine;
}

/**
 * Options for creating a CommandContext with service overrides
 */
export interface CommandContextOptions {
  /**
   * Used for every `cadSession()` call regardless of kind
   */
  cadSessionOverride?: CadSessionPort;
  qualityScorerOverride?: QualityScorerPort;
  optimizationEngineOverride?: OptimizationEngine;
}

/**
 * Command context - provides services and initialization
 */
export class CommandContext {
  private _initialized = false;
  private _services: CommandServices | null = null;
  private readonly _options: CommandContextOptions;

  constructor(options: CommandContextOptions = {}) {
    this._options = options;
  }

  /**
   * Load config.yaml once so a malformed file fails before any work starts
   */
  async ensureInitialized(): Promise<void> {
    if (!this._initialized) {
      loadConfigFromYaml();
      this._initialized = true;
    }
  }

  /**
   * Get services (lazy creation)
   */
  get services(): CommandServices {
    if (!this._services) {
      this._services = this._createServices();
    }
    return this._services;
  }

  private _createServices(): CommandServices {
    return {
      cadSession: (kind) => {
        if (this._options.cadSessionOverride) {
          return this._options.cadSessionOverride;
        }
        return kind === 'mock'
          ? new MockCadSession()
          : new FreeCadSession(new FreeCadBridge(getFreeCadConfig()));
      },
      qualityScorer: () => this._options.qualityScorerOverride ?? new GeometryQualityScorer(),
      optimizationEngine: () =>
        this._options.optimizationEngineOverride ?? new OptimizationEngine(),
    };
  }
}

/**
 * Factory function to create CommandContext with optional overrides
 */
export function createCommandContext(options: CommandContextOptions = {}): CommandContext {
  return new CommandContext(options);
}
