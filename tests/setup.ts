// Environment for every test file; nothing under src/ may be imported here,
// since config reads process.env when it first loads.
process.env.NODE_ENV = 'test';
process.env.JWT_SECRET = 'test-secret';
process.env.ESCROW_ADMIN_ID = 'user_admin';
process.env.ESCROW_FEE_BASIS_POINTS = '42';
process.env.ESCROW_FEE_POLICY = 'STORE_AND_CLAIM';

jest.setTimeout(10000);
