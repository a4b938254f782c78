process.env.NODE_ENV = 'test';
process.env.HR_API_URL = 'http://hr.test';
process.env.HR_API_TOKEN = 'test-token';
process.env.DEVICE_IP = '';
process.env.DEVICE_API_TOKEN = '';
