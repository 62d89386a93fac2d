// Test setup file
process.env.NODE_ENV = 'test';

// Keep logger output quiet unless a test run asks for it
delete process.env.QUIRE_DEBUG;
