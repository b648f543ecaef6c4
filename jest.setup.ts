/**
 * Jest Test Setup
 */

process.env.NODE_ENV = 'test';
process.env.FORCE_COLOR = '0';
