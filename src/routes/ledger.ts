import type { FastifyInstance } from "fastify";
import { LedgerNodeError } from "../errors";
import type { LedgerNode } from "../node/ledgerNode";
import { HeightParamsSchema, NewBlockBodySchema, SetBestBodySchema } from "../ledger/schemas";
import { sendInvalidRequest } from "./replies";

export async function registerLedgerRoutes(app: FastifyInstance, node: LedgerNode) {
  app.get('/ledger/blocks', async (_request, reply) => {
    try {
      const blocks = await node.canonicalChain();
      return { blocks, count: blocks.length, bestHeight: blocks.length - 1 };
    } catch (error) {
      app.log.error({ err: error }, 'reading canonical chain failed');
      return reply.status(500).send({ error: 'Ledger error', details: String(error) });
    }
  });

  app.get('/ledger/best/:height', async (request, reply) => {
    const params = HeightParamsSchema.safeParse(request.params);
    if (!params.success) {
      return sendInvalidRequest(reply, params.error);
    }

    try {
      const { height } = params.data;
      const blockId = await node.bestBlockAtHeight(height);
      if (blockId === undefined) {
        return reply.status(404).send({ error: `No canonical block at height ${height}` });
      }
      return { height, blockId };
    } catch (error) {
      app.log.error({ err: error }, 'best block lookup failed');
      return reply.status(500).send({ error: 'Ledger error', details: String(error) });
    }
  });

  app.get<{ Params: { id: string } }>('/ledger/blocks/:id', async (request, reply) => {
    try {
      const block = await node.wholeBlock(request.params.id);
      if (!block) {
        return reply.status(404).send({ error: `Unknown block ${request.params.id}` });
      }
      return block;
    } catch (error) {
      app.log.error({ err: error }, 'block lookup failed');
      return reply.status(500).send({ error: 'Ledger error', details: String(error) });
    }
  });

  app.post('/ledger/blocks', async (request, reply) => {
    const body = NewBlockBodySchema.safeParse(request.body);
    if (!body.success) {
      return sendInvalidRequest(reply, body.error);
    }

    try {
      const { parent, body: transactions, best } = body.data;
      const id = best ? await node.addBlockAsBest(parent, transactions) : await node.addBlock(parent, transactions);
      const height = await node.heightOf(id);
      return reply.status(201).send({ status: 'Block accepted', id, height, best });
    } catch (error) {
      if (error instanceof LedgerNodeError) {
        return reply.status(400).send({ error: error.message });
      }
      app.log.error({ err: error }, 'storing block failed');
      return reply.status(500).send({ error: 'Ledger error', details: String(error) });
    }
  });

  app.put('/ledger/best', async (request, reply) => {
    const body = SetBestBodySchema.safeParse(request.body);
    if (!body.success) {
      return sendInvalidRequest(reply, body.error);
    }

    try {
      await node.setBest(body.data.id);
      return { id: body.data.id, height: await node.heightOf(body.data.id) };
    } catch (error) {
      if (error instanceof LedgerNodeError) {
        return reply.status(404).send({ error: error.message });
      }
      app.log.error({ err: error }, 'setting best block failed');
      return reply.status(500).send({ error: 'Ledger error', details: String(error) });
    }
  });
}
