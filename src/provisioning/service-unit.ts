/**
 * systemd unit for the Greengrass nucleus
 */

import * as path from 'path';

export interface ServiceUnitOptions {
	installationRoot: string;
	user: string;
	group: string;
	javaHome: string;
}

export function nucleusJarPath(installationRoot: string): string {
	return path.join(installationRoot, 'lib', 'Greengrass.jar');
}

export function unitFileName(serviceName: string): string {
	return serviceName.endsWith('.service') ? serviceName : `${serviceName}.service`;
}

export function renderServiceUnit(options: ServiceUnitOptions): string {
	const root = path.resolve(options.installationRoot);
	const java = path.join(options.javaHome, 'bin', 'java');

	return [
		'[Unit]',
		'Description=Greengrass Core',
		'After=network.target',
		'',
		'[Service]',
		'Type=simple',
		`PIDFile=${path.join(root, 'alts', 'loader.pid')}`,
		'RemainAfterExit=no',
		'Restart=on-failure',
		'RestartSec=10',
		`User=${options.user}`,
		`Group=${options.group}`,
		`Environment="JAVA_HOME=${options.javaHome}"`,
		`ExecStart=${java} -Dlog.store=FILE -Droot=${root} -jar ${nucleusJarPath(root)} --config-path ${path.join(root, 'config', 'config.yaml')}`,
		'StandardOutput=journal',
		'StandardError=journal',
		'',
		'[Install]',
		'WantedBy=multi-user.target',
		'',
	].join('\n');
}
