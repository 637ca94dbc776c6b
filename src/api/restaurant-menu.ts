import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { config } from "../config.js";
import { readForm, parseId } from "./forms.js";
import { requireUser } from "../middleware/auth.js";
import {
  createMenuItem,
  deleteMenuItem,
  findMenuItem,
  getMenuSettings,
  listMenuItems,
  setFullMenuImage,
  setMenuItemImage,
  updateMenuItem,
  type MenuItemInput,
} from "../menu/service.js";
import { renderRestaurantMenu } from "../views/pages.js";

const menuItemForm = z.object({
  name: z.string().trim().min(1),
  price: z.string().trim().min(1).pipe(z.coerce.number().finite().nonnegative()),
  description: z.string().trim(),
});

const MENU_PAGE = "/restaurant/menu";

function parseMenuItem(fields: Record<string, string>): MenuItemInput | null {
  const parsed = menuItemForm.safeParse(fields);
  if (!parsed.success) return null;
  return {
    name: parsed.data.name,
    price: parsed.data.price,
    description: parsed.data.description || null,
  };
}

export function registerRestaurantMenuRoutes(app: FastifyInstance) {
  app.get("/restaurant/menu", async (req, reply) => {
    const user = requireUser(req);
    const settings = getMenuSettings();
    return reply.type("text/html").send(
      renderRestaurantMenu({ user, items: listMenuItems(), fullMenuImage: settings.fullMenuImage }),
    );
  });

  app.post("/restaurant/menu/add", async (req, reply) => {
    const { fields, files } = await readForm(req);
    const input = parseMenuItem(fields);
    if (!input) {
      return reply.redirect(MENU_PAGE, 303);
    }

    const upload = files.get("item_image");
    const imagePath = upload ? await app.images.save(upload) : null;
    const item = createMenuItem(input, imagePath);

    req.log.info({ menuItemId: item.id, imagePath }, "menu item created");
    return reply.redirect(MENU_PAGE, 303);
  });

  app.post("/restaurant/menu/update/:id", async (req, reply) => {
    const id = parseId(req.params);
    const { fields } = await readForm(req);
    const input = parseMenuItem(fields);

    if (id !== null && input && updateMenuItem(id, input)) {
      req.log.info({ menuItemId: id, price: input.price }, "menu item updated");
    }
    return reply.redirect(MENU_PAGE, 303);
  });

  // The previous image file stays on disk
  app.post("/restaurant/menu/upload-image/:id", async (req, reply) => {
    const id = parseId(req.params);
    const { files } = await readForm(req);
    const upload = files.get("item_image");

    if (id !== null && upload && findMenuItem(id)) {
      const imagePath = await app.images.save(upload);
      setMenuItemImage(id, imagePath);
      req.log.info({ menuItemId: id, imagePath }, "menu item image replaced");
    }
    return reply.redirect(MENU_PAGE, 303);
  });

  app.post("/restaurant/menu/upload-full-menu", async (req, reply) => {
    const { files } = await readForm(req);
    const upload = files.get("full_menu_image");

    if (upload) {
      const imagePath = await app.images.save(upload);
      setFullMenuImage(imagePath);
      req.log.info({ imagePath }, "full menu image replaced");
    }
    return reply.redirect(MENU_PAGE, 303);
  });

  app.get("/restaurant/menu/delete/:id", async (req, reply) => {
    const id = parseId(req.params);
    if (id !== null && deleteMenuItem(id, config.deletePolicy)) {
      req.log.info({ menuItemId: id, policy: config.deletePolicy }, "menu item deleted");
    }
    return reply.redirect(MENU_PAGE, 303);
  });
}
