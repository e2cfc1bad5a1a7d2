/**
 * Component Logger
 * ================
 *
 * Wrapper around ProvisioningLogger that adds the component name to every call.
 *
 * Usage:
 *   const logger = new ComponentLogger(provisioningLogger, 'ConfigMaterializer');
 *   logger.info('Wrote certificates'); // component: 'ConfigMaterializer' auto-added
 */

import type { ProvisioningLogger } from './provisioning-logger';
import type { LogContext } from './types';

export class ComponentLogger {
	constructor(
		private readonly logger: ProvisioningLogger,
		private readonly component: string
	) {}

	private mergeContext(context?: LogContext): LogContext {
		return {
			component: this.component,
			...context,
		};
	}

	debug(message: string, context?: LogContext): void {
		this.logger.debug(message, this.mergeContext(context));
	}

	info(message: string, context?: LogContext): void {
		this.logger.info(message, this.mergeContext(context));
	}

	warn(message: string, context?: LogContext): void {
		this.logger.warn(message, this.mergeContext(context));
	}

	error(message: string, error?: unknown, context?: LogContext): void {
		this.logger.error(message, error, this.mergeContext(context));
	}

	isDebugEnabled(): boolean {
		return this.logger.isLevelEnabled('debug');
	}
}
