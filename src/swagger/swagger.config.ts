import swaggerJsdoc from 'swagger-jsdoc';
import { env } from '../config/environment';

const timestamp = { type: 'string', format: 'date-time' };
const uuid = { type: 'string', format: 'uuid' };

/**
 * Swagger/OpenAPI Configuration
 *
 * Generates OpenAPI 3.0 specification from JSDoc comments in route files
 */
const options: swaggerJsdoc.Options = {
  definition: {
    openapi: '3.0.0',
    info: {
      title: 'Venue Reservation API',
      version: '1.0.0',
      description: `
Book venues for a time window together with shared materials, subject to a two-tier approval chain.

## Features
- Venue and material catalog with maintenance / availability flags
- Applications that reserve a venue slot and material quantities in one step
- Reviewer and admin approval tiers
- Cancellation and rejection return held materials

## Guarantees
- No two active applications on one venue overlap in time (\`[start, end)\` intervals)
- \`0 ≤ available_quantity ≤ total_quantity\` for every material at every commit
- Creation and every transition commit as one unit of work or not at all

## Application Lifecycle
1. **pending_reviewer**: submitted by a member, waits for a reviewer
2. **pending_admin**: passed review, or submitted by a reviewer or admin
3. **approved**: final approval (materials stay held)
4. **rejected** / **cancelled**: terminal, materials returned

## Identity
Requests that act on behalf of someone carry \`x-actor-id\` and \`x-actor-role\`
(member, reviewer, admin, super_admin) set by the upstream gateway.
      `.trim(),
      contact: {
        name: 'API Support',
      },
    },
    servers: [
      {
        url: `http://localhost:${env.PORT}`,
        description: env.NODE_ENV === 'production' ? 'Production server' : 'Development server',
      },
    ],
    tags: [
      { name: 'Applications', description: 'Submitting and tracking applications' },
      { name: 'Approvals', description: 'Reviewer and admin approval queues' },
      { name: 'Venues', description: 'Venue catalog and availability' },
      { name: 'Materials', description: 'Material catalog and stock' },
    ],
    components: {
      securitySchemes: {
        actorId: { type: 'apiKey', in: 'header', name: 'x-actor-id' },
        actorRole: { type: 'apiKey', in: 'header', name: 'x-actor-role' },
      },
      schemas: {
        Venue: {
          type: 'object',
          properties: {
            id: uuid,
            name: { type: 'string' },
            location: { type: 'string' },
            capacity: { type: 'integer', minimum: 1 },
            description: { type: 'string' },
            equipment: { type: 'array', items: { type: 'string' } },
            status: { type: 'string', enum: ['available', 'maintenance'] },
            version: { type: 'integer' },
            createdAt: timestamp,
            updatedAt: timestamp,
          },
        },
        Material: {
          type: 'object',
          properties: {
            id: uuid,
            name: { type: 'string' },
            category: { type: 'string' },
            unit: { type: 'string' },
            description: { type: 'string' },
            totalQuantity: { type: 'integer', minimum: 0 },
            availableQuantity: {
              type: 'integer',
              minimum: 0,
              description: 'Units not held by any active application',
            },
            status: { type: 'string', enum: ['available', 'unavailable'] },
            version: { type: 'integer' },
            createdAt: timestamp,
            updatedAt: timestamp,
          },
        },
        Application: {
          type: 'object',
          properties: {
            id: uuid,
            requesterId: { type: 'string' },
            activityName: { type: 'string' },
            activityDescription: { type: 'string' },
            venueId: uuid,
            startTime: timestamp,
            endTime: timestamp,
            lineItems: {
              type: 'array',
              items: {
                type: 'object',
                properties: {
                  materialId: uuid,
                  quantity: { type: 'integer', minimum: 1 },
                },
              },
            },
            status: {
              type: 'string',
              enum: ['pending_reviewer', 'pending_admin', 'approved', 'rejected', 'cancelled'],
            },
            reviewerId: { type: 'string', nullable: true },
            rejectionReason: { type: 'string', nullable: true },
            reviewedAt: { ...timestamp, nullable: true },
            version: { type: 'integer' },
            createdAt: timestamp,
            updatedAt: timestamp,
          },
        },
        Error: {
          type: 'object',
          properties: {
            error: {
              type: 'object',
              properties: {
                code: {
                  type: 'string',
                  description: 'Error code',
                },
                message: {
                  type: 'string',
                  description: 'Human-readable error message',
                },
                details: {
                  type: 'object',
                  description: 'Additional error details',
                },
              },
            },
          },
        },
      },
    },
  },
  apis: ['./src/routes/**/*.ts'], // Path to route files with JSDoc comments
};

export const swaggerSpec = swaggerJsdoc(options);
