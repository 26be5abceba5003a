// src/__mocks__/nodemailer.ts

// Each transport gets its own spies so tests can inspect the one they built
export const createTransport = jest.fn().mockImplementation(() => ({
  // Return a resolved Promise to simulate successful email sending
  sendMail: jest.fn().mockResolvedValue({ messageId: 'mock-message-id' }),
  verify: jest.fn(),
}));

// Export this structure to mimic the real nodemailer library
export default {
  createTransport,
};
