import dotenv from 'dotenv';

dotenv.config();

interface Config {
    port: number;
    nodeEnv: string;
    hr: {
        url: string;
        apiToken: string;
        employeeIdField: string;
        userIdField: string;
        deviceIdField?: string;
    };
    device: {
        ip?: string;
        port: number;
        apiToken?: string;
    };
    sync: {
        enabled: boolean;
        intervalSeconds: number;
        cron: string;
    };
    logging: {
        level: string;
        file: string;
    };
}

function getEnvVar(key: string, defaultValue?: string): string {
    const value = process.env[key] || defaultValue;
    if (!value) {
        throw new Error(`Missing required environment variable: ${key}`);
    }
    return value;
}

function getEnvVarOptional(key: string, defaultValue?: string): string | undefined {
    return process.env[key] || defaultValue;
}

function getEnvInt(key: string, defaultValue: string): number {
    const raw = getEnvVar(key, defaultValue);
    const value = parseInt(raw, 10);
    if (isNaN(value)) {
        throw new Error(`Environment variable ${key} must be an integer, got "${raw}"`);
    }
    return value;
}

const config: Config = {
    port: getEnvInt('PORT', '3000'),
    nodeEnv: getEnvVar('NODE_ENV', 'development'),
    hr: {
        url: getEnvVar('HR_API_URL'),
        apiToken: getEnvVar('HR_API_TOKEN'),
        employeeIdField: getEnvVar('HR_EMPLOYEE_ID_FIELD', 'employeeId'),
        userIdField: getEnvVar('HR_USER_ID_FIELD', 'userId'),
        deviceIdField: getEnvVarOptional('HR_DEVICE_ID_FIELD'),
    },
    device: {
        ip: getEnvVarOptional('DEVICE_IP'),
        port: getEnvInt('DEVICE_PORT', '4370'),
        apiToken: getEnvVarOptional('DEVICE_API_TOKEN'),
    },
    sync: {
        enabled: getEnvVar('SYNC_ENABLED', 'true') === 'true',
        intervalSeconds: getEnvInt('SYNC_INTERVAL_SECONDS', '300'),
        cron: getEnvVar('SYNC_CRON', '* * * * *'),
    },
    logging: {
        level: getEnvVar('LOG_LEVEL', 'info'),
        file: getEnvVar('LOG_FILE', './logs/bridge.log'),
    },
};

if (config.sync.intervalSeconds <= 0) {
    throw new Error('SYNC_INTERVAL_SECONDS must be a positive number of seconds');
}

export default config;
