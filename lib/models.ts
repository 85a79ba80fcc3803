/**
 * User model representing the users table
 */
export interface User {
    id: number;
    username: string;
    password_hash: string;
    role: string;
    created_at: string; // ISO date string
    last_login?: string | null; // ISO date string
}

/**
 * InstanceRecord model representing the instances table.
 * Display metadata only; the config directory stays authoritative.
 */
export interface InstanceRecord {
    name: string;
    domain: string;
    has_enterprise: number; // 0 | 1
    ssl_enabled: number; // 0 | 1
    http_port: number;
    gevent_port: number;
    created_at: string; // ISO date string
}

