import { EnvironmentType, getEnvironmentType, getStableEnvironmentName, isRunningInLambda } from '../src';

describe('Environment Utilities', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
    delete process.env.ENV;
    delete process.env.AWS_LAMBDA_FUNCTION_NAME;
  });

  afterAll(() => {
    process.env = originalEnv;
  });

  describe('getEnvironmentType', () => {
    it('should return Production for "production"', () => {
      expect(getEnvironmentType('production')).toBe(EnvironmentType.Production);
    });

    it('should ignore case and surrounding whitespace', () => {
      expect(getEnvironmentType(' Sandbox ')).toBe(EnvironmentType.Sandbox);
    });

    it('should return Preview for unknown names', () => {
      expect(getEnvironmentType('pr123')).toBe(EnvironmentType.Preview);
      expect(getEnvironmentType('development')).toBe(EnvironmentType.Preview);
    });

    it('should read the ENV variable when no name is provided', () => {
      process.env.ENV = 'production';
      expect(getEnvironmentType()).toBe(EnvironmentType.Production);
    });

    it('should default to Preview when nothing is configured', () => {
      expect(getEnvironmentType()).toBe(EnvironmentType.Preview);
    });
  });

  describe('getStableEnvironmentName', () => {
    it('should return "production" for Production environment type', () => {
      expect(getStableEnvironmentName(EnvironmentType.Production)).toBe('production');
    });

    it('should return "sandbox" for non-Production environment types', () => {
      expect(getStableEnvironmentName(EnvironmentType.Sandbox)).toBe('sandbox');
      expect(getStableEnvironmentName(EnvironmentType.Preview)).toBe('sandbox');
    });

    it('should use the current environment type if none is provided', () => {
      expect(getStableEnvironmentName()).toBe('sandbox');
    });
  });

  describe('isRunningInLambda', () => {
    it('should detect the lambda runtime by the function name variable', () => {
      expect(isRunningInLambda()).toBe(false);
      process.env.AWS_LAMBDA_FUNCTION_NAME = 'resume-screener-evaluate';
      expect(isRunningInLambda()).toBe(true);
    });
  });
});
